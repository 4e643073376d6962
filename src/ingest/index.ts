/**
 * Ingest Module
 *
 * Turns a directory of text files into embedding records:
 * discover → chunk → embed → append.
 */

export * from './chunker/index.js';
export * from './embedder/index.js';
export * from './writer/index.js';
export { discoverTextFiles, isTextFile, TEXT_FILE_EXTENSION } from './scanner.js';
export type { DiscoveredFile, DiscoverOptions } from './scanner.js';
export { runIngestPipeline, type IngestPipelineOptions } from './pipeline.js';
export { FileReadError, EmbeddingRequestError, EmbeddingError, RecordWriteError } from './errors.js';
export type { RunState, RunStats, FileStatus, FileOutcome, IngestRunResult } from './types.js';
