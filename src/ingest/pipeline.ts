/**
 * Ingest Pipeline
 *
 * Orchestrates one ingestion run:
 * Health check → Open output → Discover → (Chunk → Embed → Write) per file
 *
 * This is the only place that decides how bad a failure is:
 * - Health check or output open failure: fatal, the run is aborted
 * - Unreadable file: file skipped, counted as an error
 * - Embedding or write failure: rest of that file abandoned, counted as an error
 * - Cancellation: CancelledError propagates, records already written stay
 *
 * It doesn't know HOW progress is displayed. It fires callbacks and the
 * caller renders them.
 */

import { CancelledError, OutputError } from '../errors/index.js';
import { silentLogger, type Logger } from '../utils/index.js';
import { chunkFile, type Chunk } from './chunker/index.js';
import type { EmbeddingClient } from './embedder/index.js';
import { discoverTextFiles, type DiscoveredFile } from './scanner.js';
import { JsonlRecordWriter, createRecord, type RecordSink } from './writer/index.js';
import type { FileOutcome, IngestRunResult, RunState, RunStats } from './types.js';

/**
 * Options for running the ingest pipeline.
 *
 * Paths are expected to be validated already (see validateIngestConfig).
 */
export interface IngestPipelineOptions {
  /** Directory to ingest */
  inputDir: string;

  /** Output path, passed to openSink */
  outputPath: string;

  /** Target words per chunk */
  chunkSize: number;

  /** Embedding service */
  client: EmbeddingClient;

  /**
   * Opens the record sink.
   * @default JsonlRecordWriter.open
   */
  openSink?: (outputPath: string) => Promise<RecordSink>;

  /** Receives debug lines, and warnings when no onWarning is given */
  logger?: Logger;

  /**
   * Cancels the run at the next check, during a backoff wait or
   * during an in-flight request.
   */
  signal?: AbortSignal;

  onStateChange?: (state: RunState) => void;
  onFilesDiscovered?: (total: number) => void;
  onFileStart?: (file: DiscoveredFile, index: number, total: number) => void;
  onFileComplete?: (outcome: FileOutcome, index: number, total: number) => void;
  onWarning?: (message: string, context?: string) => void;
  onError?: (error: Error, context?: string) => void;
}

/**
 * Throws CancelledError if the signal has been triggered.
 */
function checkCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Run one ingestion.
 *
 * Resolves with the run result even when files failed; rejects only with
 * ConnectivityError, OutputError or CancelledError.
 *
 * @example
 * ```typescript
 * const client = new OllamaEmbeddingClient({ model: 'nomic-embed-text' });
 *
 * const result = await runIngestPipeline({
 *   inputDir: '/data/corpus',
 *   outputPath: '/data/storage/vectors.jsonl',
 *   chunkSize: 300,
 *   client,
 *   onFileComplete: (outcome) => console.log(outcome.sourceFile, outcome.status),
 * });
 *
 * console.log(`${result.stats.chunksCreated} records written`);
 * ```
 */
export async function runIngestPipeline(options: IngestPipelineOptions): Promise<IngestRunResult> {
  const {
    inputDir,
    outputPath,
    chunkSize,
    client,
    signal,
    onStateChange,
    onFilesDiscovered,
    onFileStart,
    onFileComplete,
    onError,
  } = options;
  const logger = options.logger ?? silentLogger;
  const openSink = options.openSink ?? ((path: string) => JsonlRecordWriter.open(path));

  const startedAt = performance.now();
  const warnings: string[] = [];
  const errors: string[] = [];
  const outcomes: FileOutcome[] = [];
  const stats: RunStats = {
    filesProcessed: 0,
    filesSkipped: 0,
    chunksCreated: 0,
    totalErrors: 0,
    startTime: new Date(),
  };

  const warn = (message: string, context?: string): void => {
    warnings.push(context ? `${context}: ${message}` : message);
    if (options.onWarning) {
      options.onWarning(message, context);
    } else {
      logger.warn(context ? `${context}: ${message}` : message);
    }
  };

  let state: RunState = 'idle';
  const transition = (next: RunState): void => {
    logger.debug?.(`Run state: ${state} -> ${next}`);
    state = next;
    onStateChange?.(next);
  };

  // =========================================================================
  // HEALTH CHECK
  // =========================================================================
  checkCancelled(signal);
  transition('health_checking');
  try {
    await client.healthCheck(signal);
  } catch (error) {
    if (!(error instanceof CancelledError)) {
      transition('aborted');
    }
    throw error;
  }

  // =========================================================================
  // OPEN OUTPUT
  // =========================================================================
  checkCancelled(signal);
  let sink: RecordSink;
  try {
    sink = await openSink(outputPath);
  } catch (error) {
    transition('aborted');
    throw new OutputError(outputPath, toError(error));
  }

  try {
    // =======================================================================
    // DISCOVERY
    // =======================================================================
    transition('discovering');
    const files = await discoverTextFiles(inputDir, {
      onError: (path, error) => warn(`Cannot traverse: ${error.message}`, path),
    });
    onFilesDiscovered?.(files.length);

    if (files.length === 0) {
      warn(`No .txt files found in ${inputDir}`);
    } else {
      logger.debug?.(`Discovered ${files.length} text file(s) in ${inputDir}`);
    }

    // =======================================================================
    // PROCESSING
    // =======================================================================
    transition('processing');
    for (const [index, file] of files.entries()) {
      checkCancelled(signal);
      onFileStart?.(file, index, files.length);

      const outcome = await processFile(file);
      outcomes.push(outcome);

      switch (outcome.status) {
        case 'processed':
        case 'empty':
          stats.filesProcessed++;
          break;
        case 'skipped':
        case 'failed':
          stats.filesSkipped++;
          stats.totalErrors++;
          errors.push(`${outcome.sourceFile}: ${outcome.error ?? outcome.status}`);
          break;
      }

      onFileComplete?.(outcome, index, files.length);
    }

    // =======================================================================
    // FINALIZING
    // =======================================================================
    transition('finalizing');
    stats.endTime = new Date();
  } finally {
    try {
      await sink.close();
    } catch (error) {
      warn(`Failed to close output: ${toError(error).message}`, outputPath);
    }
  }

  let outputSize: number | undefined;
  if (sink.size) {
    try {
      outputSize = await sink.size();
    } catch (error) {
      logger.debug?.(`Could not read output size: ${toError(error).message}`);
    }
  }

  transition('done');

  return {
    stats,
    files: outcomes,
    outputPath: sink.path,
    outputSize,
    durationMs: Math.round(performance.now() - startedAt),
    warnings,
    errors,
  };

  /**
   * Chunk, embed and write one file. Only CancelledError escapes.
   */
  async function processFile(file: DiscoveredFile): Promise<FileOutcome> {
    const sourceFile = file.relativePath;

    let chunks: Chunk[];
    try {
      chunks = await chunkFile(file.path, chunkSize);
    } catch (error) {
      const failure = toError(error);
      onError?.(failure, sourceFile);
      return { sourceFile, status: 'skipped', chunks: 0, recordsWritten: 0, error: failure.message };
    }

    if (chunks.length === 0) {
      logger.debug?.(`${sourceFile}: no words, nothing to embed`);
      return { sourceFile, status: 'empty', chunks: 0, recordsWritten: 0 };
    }

    logger.debug?.(`${sourceFile}: ${chunks.length} chunk(s)`);

    let recordsWritten = 0;
    for (const chunk of chunks) {
      try {
        const embedding = await client.getEmbedding(chunk.text, signal);
        await sink.write(createRecord(sourceFile, chunk, embedding));
      } catch (error) {
        if (error instanceof CancelledError) {
          throw error;
        }
        const failure = toError(error);
        onError?.(failure, `${sourceFile} (chunk ${chunk.index})`);
        return {
          sourceFile,
          status: 'failed',
          chunks: chunks.length,
          recordsWritten,
          error: failure.message,
        };
      }
      recordsWritten++;
      stats.chunksCreated++;
    }

    return { sourceFile, status: 'processed', chunks: chunks.length, recordsWritten };
  }
}
