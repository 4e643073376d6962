/**
 * Chunker Module
 *
 * Word-count chunking for plain-text files.
 *
 * Usage:
 * ```typescript
 * import { chunkFile } from './chunker/index.js';
 *
 * const chunks = await chunkFile('/data/notes.txt', 300);
 * for (const chunk of chunks) {
 *   console.log(chunk.index, chunk.wordCount);
 * }
 * ```
 */

export { chunkText, chunkFile, tokenizeWords, isWord, trimWhitespace } from './chunker.js';
export { DEFAULT_CHUNK_SIZE } from './config.js';
export type { Chunk } from './types.js';
