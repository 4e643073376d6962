/**
 * Error type definitions for the textvec CLI
 *
 * These custom error classes provide:
 * - Actionable error messages with recovery hints
 * - Exit codes for programmatic error handling
 * - Type safety for error handling logic
 *
 * Only errors that end a run (or a command) live here. Recoverable,
 * per-file and per-chunk failures are typed in `ingest/errors.ts` and
 * never reach the user as an exit status.
 */

/**
 * Base class for all CLI errors.
 *
 * hint: tells the user HOW to fix the problem
 * code: process exit status, so scripts can tell failures apart
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1) {
    super(message);
    // Required for instanceof checks after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown when a file or directory doesn't exist.
 *
 * Exit code 3: File not found (following common Unix conventions)
 */
export class FileNotFoundError extends CLIError {
  constructor(path: string) {
    super(
      `Path does not exist: ${path}`,
      'Check the path and try again',
      3
    );
    this.name = 'FileNotFoundError';
  }
}

/**
 * Thrown for configuration-related errors.
 *
 * Examples:
 * - Invalid TOML syntax in config.toml
 * - Input path that is not a directory
 * - Non-positive chunk size
 *
 * Exit code 2: Configuration error
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(
      message,
      hint ?? 'Run: textvec config list  to see valid options',
      2
    );
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when input validation fails.
 *
 * Used with Zod schemas to provide detailed field-level errors.
 *
 * Exit code 1: General error (validation is user input error)
 */
export class ValidationError extends CLIError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0
        ? `Issues:\n  ${issues.join('\n  ')}`
        : 'Check your input and try again';
    super(message, hint, 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * Thrown when the output file cannot be opened for appending.
 *
 * Fatal: no chunk is processed without a place to put its record.
 *
 * Exit code 5: Output error
 */
export class OutputError extends CLIError {
  constructor(path: string, cause?: Error) {
    super(
      `Cannot open output file: ${path}` + (cause ? ` (${cause.message})` : ''),
      'Check that the output directory is writable, or pass a different --output',
      5
    );
    this.name = 'OutputError';
    this.cause = cause;
  }
}

/**
 * Thrown when the embedding service fails its startup health check.
 *
 * Exit code 6: Embedding service unreachable
 */
export class ConnectivityError extends CLIError {
  /** Base URL that was contacted */
  public readonly baseUrl: string;

  /** HTTP status, when the service answered with a non-2xx response */
  public readonly status?: number;

  constructor(
    baseUrl: string,
    detail: string,
    options: { status?: number; cause?: Error } = {}
  ) {
    super(
      `Embedding service is not reachable at ${baseUrl}: ${detail}`,
      'Make sure Ollama is running (ollama serve), or set OLLAMA_HOST / --base-url',
      6
    );
    this.name = 'ConnectivityError';
    this.baseUrl = baseUrl;
    this.status = options.status;
    this.cause = options.cause;
  }
}

/**
 * Thrown when a run is stopped by its cancellation signal (Ctrl+C).
 *
 * Exit code 130: conventional status for SIGINT
 */
export class CancelledError extends CLIError {
  constructor(message: string = 'Ingestion cancelled') {
    super(message, 'Records written before cancellation remain in the output file', 130);
    this.name = 'CancelledError';
  }
}
