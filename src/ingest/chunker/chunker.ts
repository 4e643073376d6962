/**
 * Chunker
 *
 * Splits plain text into ordered chunks of a target word count.
 *
 * Algorithm:
 * 1. Trim the whole text; empty text yields no chunks
 * 2. Split on whitespace and drop tokens with no letter or digit
 *    ("--", "...", "*" go; "end." and "$5" stay verbatim)
 * 3. At or under the target size: one chunk holding the trimmed original
 *    text, so dropped punctuation tokens survive in `text` while
 *    `wordCount` counts only kept words
 * 4. Over the target size: consecutive groups of exactly `targetSize`
 *    words joined by single spaces; only the last group may be shorter
 */

import { readFile } from 'node:fs/promises';

import { FileReadError } from '../errors.js';
import { EDGE_WHITESPACE, TOKEN_SEPARATOR, WORD_CHARACTER } from './config.js';
import type { Chunk } from './types.js';

/**
 * Whether a token carries at least one letter or decimal digit.
 */
export function isWord(token: string): boolean {
  return WORD_CHARACTER.test(token);
}

/**
 * Split text into words, keeping tokens verbatim and dropping
 * punctuation-only ones.
 */
export function tokenizeWords(text: string): string[] {
  return text.split(TOKEN_SEPARATOR).filter((token) => token.length > 0 && isWord(token));
}

/**
 * Trim White_Space from both ends. String.prototype.trim also strips U+FEFF.
 */
export function trimWhitespace(text: string): string {
  return text.replace(EDGE_WHITESPACE, '');
}

/**
 * Split text into chunks of `targetSize` words.
 *
 * @param text - Raw file content
 * @param targetSize - Words per chunk, a positive integer
 * @returns Chunks in order with indices 0..n-1
 * @throws RangeError if targetSize is not a positive integer
 *
 * @example
 * ```typescript
 * chunkText('word '.repeat(25), 10).map((c) => c.wordCount);
 * // => [10, 10, 5]
 * ```
 */
export function chunkText(text: string, targetSize: number): Chunk[] {
  if (!Number.isInteger(targetSize) || targetSize <= 0) {
    throw new RangeError(`Chunk size must be a positive integer, got: ${targetSize}`);
  }

  const trimmed = trimWhitespace(text);
  if (trimmed === '') {
    return [];
  }

  const words = tokenizeWords(trimmed);
  if (words.length === 0) {
    return [];
  }

  if (words.length <= targetSize) {
    return [{ text: trimmed, wordCount: words.length, index: 0 }];
  }

  const chunks: Chunk[] = [];
  let index = 0;

  for (let start = 0; start < words.length; start += targetSize) {
    const group = words.slice(start, start + targetSize);
    const groupText = trimWhitespace(group.join(' '));

    // Unreachable with filtered tokens; an empty group would break index contiguity
    if (groupText === '') {
      continue;
    }

    chunks.push({ text: groupText, wordCount: group.length, index });
    index++;
  }

  return chunks;
}

/**
 * Read a file as UTF-8 and chunk its content.
 *
 * @throws FileReadError if the file cannot be opened or read
 */
export async function chunkFile(filePath: string, targetSize: number): Promise<Chunk[]> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new FileReadError(filePath, error);
  }

  return chunkText(content, targetSize);
}
