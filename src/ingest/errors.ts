/**
 * Ingest Module Errors
 *
 * Lower-level components throw these to describe WHAT failed. Whether a
 * failure skips a chunk, a file, or ends the run is decided only by the
 * pipeline (see pipeline.ts).
 */

/**
 * A source file could not be opened or read.
 */
export class FileReadError extends Error {
  /** Path that failed to read */
  public readonly filePath: string;

  constructor(filePath: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to read file ${filePath}: ${detail}`, { cause });
    this.name = 'FileReadError';
    this.filePath = filePath;
  }
}

/**
 * A single embedding request failed.
 *
 * Covers network failures, timeouts, non-2xx responses, malformed bodies
 * and empty embedding arrays.
 */
export class EmbeddingRequestError extends Error {
  /** HTTP status when the service answered with a non-2xx response */
  public readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'EmbeddingRequestError';
    this.status = options.status;
  }
}

/**
 * All attempts for one embedding failed. `cause` holds the last
 * EmbeddingRequestError.
 */
export class EmbeddingError extends Error {
  /** Total attempts made (first try plus retries) */
  public readonly attempts: number;

  constructor(attempts: number, lastError: Error) {
    super(
      `Failed to get embedding after ${attempts} attempt${attempts === 1 ? '' : 's'}: ${lastError.message}`,
      { cause: lastError }
    );
    this.name = 'EmbeddingError';
    this.attempts = attempts;
  }
}

/**
 * A record could not be appended, including any write after close().
 */
export class RecordWriteError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'RecordWriteError';
  }
}
