/**
 * Ingest Run Types
 */

/**
 * Run lifecycle.
 *
 * idle → health_checking → discovering → processing → finalizing → done
 *
 * `aborted` is reached only when the health check or opening the output
 * fails. Per-file and per-chunk failures never change the run state.
 */
export type RunState =
  | 'idle'
  | 'health_checking'
  | 'discovering'
  | 'processing'
  | 'finalizing'
  | 'done'
  | 'aborted';

/**
 * Counters for one run. Owned by the pipeline while it runs.
 */
export interface RunStats {
  /** Files whose chunks were all embedded and written, including empty files */
  filesProcessed: number;

  /** Files that could not be read, or whose chunks failed part way */
  filesSkipped: number;

  /** Records written */
  chunksCreated: number;

  /** One per skipped or failed file */
  totalErrors: number;

  startTime: Date;

  /** Set when the run reaches finalizing */
  endTime?: Date;
}

/**
 * What happened to one discovered file.
 *
 * - processed: every chunk written
 * - empty: no words, nothing to write
 * - skipped: the file could not be read
 * - failed: an embedding or write failed; later chunks were abandoned
 */
export type FileStatus = 'processed' | 'empty' | 'skipped' | 'failed';

export interface FileOutcome {
  /** Path relative to the input root */
  sourceFile: string;
  status: FileStatus;
  /** Chunks the file produced (0 when skipped) */
  chunks: number;
  /** Records written for this file */
  recordsWritten: number;
  /** Failure message for skipped and failed files */
  error?: string;
}

/**
 * Final result of a completed run.
 */
export interface IngestRunResult {
  stats: RunStats;

  /** One entry per discovered file, in processing order */
  files: FileOutcome[];

  /** Where records were appended */
  outputPath: string;

  /** Output size in bytes after the run, when the sink reports it */
  outputSize?: number;

  /** Wall-clock duration */
  durationMs: number;

  /** Traversal and close warnings */
  warnings: string[];

  /** Per-file error messages, prefixed with the source file */
  errors: string[];
}
