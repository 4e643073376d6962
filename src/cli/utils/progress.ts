/**
 * Ingest Reporter
 *
 * Displays progress for a running ingestion.
 * Supports multiple output modes:
 * - Interactive: ora spinner with the current file and a running count
 * - JSON: NDJSON event stream for CI/CD integration
 * - Text: one line per file for non-TTY environments (logs, pipes)
 *
 * Design decisions:
 * - Throttles spinner updates to prevent flickering (100ms minimum)
 * - Truncates file paths to fit terminal width
 * - Respects NO_COLOR environment variable
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';

import type { FileOutcome, IngestRunResult, RunState } from '../../ingest/index.js';
import type { Logger } from '../../utils/index.js';

/**
 * Configuration options for the IngestReporter.
 */
export interface IngestReporterOptions {
  /** Output as JSON events instead of human-readable text */
  json: boolean;

  /** Show per-file lines and debug output */
  verbose: boolean;

  /** Disable colors (respects NO_COLOR env) */
  noColor: boolean;

  /** Whether stdout is a TTY (for spinner support) */
  isInteractive: boolean;
}

/**
 * Settings shown when a run starts.
 */
export interface RunInfo {
  inputDir: string;
  outputPath: string;
  model: string;
  chunkSize: number;
  baseUrl: string;
}

/**
 * JSON event types for NDJSON output.
 */
export type IngestEventType =
  | 'run_start'
  | 'file_start'
  | 'file_complete'
  | 'warning'
  | 'error'
  | 'complete';

/**
 * JSON event emitted in --json mode.
 */
export interface IngestEvent {
  type: IngestEventType;
  timestamp: string;
  data: Record<string, unknown>;
}

/**
 * Spinner text for the states that happen before the file loop.
 */
const STATE_LABELS: Partial<Record<RunState, string>> = {
  health_checking: 'Checking embedding service...',
  discovering: 'Discovering text files...',
  finalizing: 'Closing output...',
};

/**
 * IngestReporter manages all progress display during ingestion.
 *
 * Usage:
 * ```typescript
 * const reporter = createIngestReporter({ json: false, verbose: false });
 *
 * reporter.start(info);
 * reporter.setState('health_checking');
 * reporter.filesDiscovered(2);
 * reporter.startFile('a.txt', 0, 2);
 * reporter.completeFile(outcome, 0, 2);
 * reporter.showSummary(result);
 * ```
 */
export class IngestReporter {
  private options: IngestReporterOptions;
  private spinner: Ora | null = null;
  private totalFiles = 0;
  private completedFiles = 0;
  private lastUpdateTime = 0;

  /** Minimum time between spinner updates to prevent flickering */
  private static readonly UPDATE_THROTTLE_MS = 100;

  /** Maximum length for file path display */
  private static readonly MAX_PATH_LENGTH = 40;

  constructor(options: IngestReporterOptions) {
    this.options = options;

    // Apply NO_COLOR if set
    if (options.noColor) {
      chalk.level = 0;
    }
  }

  /**
   * Announce the run and its settings.
   */
  start(info: RunInfo): void {
    if (this.options.json) {
      this.emitJson('run_start', { ...info });
      return;
    }

    console.log(`Ingesting ${chalk.cyan(info.inputDir)}`);
    console.log(
      chalk.dim(
        `  model ${info.model} · chunk size ${info.chunkSize} · ${info.baseUrl} → ${info.outputPath}`
      )
    );
  }

  /**
   * Reflect a run state transition.
   */
  setState(state: RunState): void {
    if (this.options.json || !this.options.isInteractive) {
      return;
    }

    const label = STATE_LABELS[state];
    if (!label) {
      return;
    }

    if (this.spinner) {
      this.spinner.text = label;
    } else {
      this.spinner = ora({ text: label }).start();
    }
  }

  /**
   * Record how many files the run will process.
   */
  filesDiscovered(total: number): void {
    this.totalFiles = total;
    this.completedFiles = 0;

    if (this.options.json) {
      return;
    }

    const message = `Found ${total.toLocaleString()} text file${total === 1 ? '' : 's'}`;
    if (this.options.isInteractive && this.spinner) {
      this.spinner.succeed(message);
      this.spinner = total > 0 ? ora({ text: 'Embedding...' }).start() : null;
    } else {
      console.log(message);
    }
  }

  /**
   * A file is about to be chunked and embedded.
   */
  startFile(sourceFile: string, index: number, total: number): void {
    if (this.options.json) {
      this.emitJson('file_start', { file: sourceFile, index, total });
      return;
    }

    if (!this.options.isInteractive || !this.spinner) {
      return;
    }

    // Throttle updates to prevent flickering
    const now = performance.now();
    if (now - this.lastUpdateTime < IngestReporter.UPDATE_THROTTLE_MS) {
      return;
    }
    this.lastUpdateTime = now;

    const percentage = total > 0 ? Math.round((index / total) * 100) : 0;
    const progressText = `${index + 1}/${total} (${percentage}%)`;
    this.spinner.text = `${progressText.padEnd(16)} ${chalk.dim(this.truncatePath(sourceFile))}`;
  }

  /**
   * A file finished, whatever its outcome.
   */
  completeFile(outcome: FileOutcome, index: number, total: number): void {
    this.completedFiles++;

    if (this.options.json) {
      this.emitJson('file_complete', {
        file: outcome.sourceFile,
        status: outcome.status,
        chunks: outcome.chunks,
        recordsWritten: outcome.recordsWritten,
        error: outcome.error,
        index,
        total,
      });
      return;
    }

    // Spinner shows progress; per-file lines only when asked for
    if (this.options.isInteractive && !this.options.verbose) {
      return;
    }

    const line = `[${index + 1}/${total}] ${outcome.sourceFile}: ${this.describeOutcome(outcome)}`;
    this.printAboveSpinner(() =>
      console.log(outcome.status === 'processed' ? line : chalk.dim(line))
    );
  }

  /**
   * Display a warning message.
   *
   * @param context - Optional context (e.g., file path)
   */
  warn(message: string, context?: string): void {
    if (this.options.json) {
      this.emitJson('warning', { message, context });
      return;
    }

    // In interactive mode, warnings are only shown in verbose mode
    // (to not clutter the spinner output)
    if (this.options.verbose || !this.options.isInteractive) {
      const contextStr = context ? ` (${context})` : '';
      this.printAboveSpinner(() => console.warn(chalk.yellow(`Warning: ${message}${contextStr}`)));
    }
  }

  /**
   * Display an error message (non-fatal).
   *
   * @param context - Optional context (e.g., file path)
   */
  error(message: string, context?: string): void {
    if (this.options.json) {
      this.emitJson('error', { message, context });
      return;
    }

    // Errors are always shown
    const contextStr = context ? ` (${context})` : '';
    this.printAboveSpinner(() => console.error(chalk.red(`Error: ${message}${contextStr}`)));
  }

  /**
   * Debug output, only with --verbose and never in JSON mode.
   */
  debug(message: string): void {
    if (this.options.verbose && !this.options.json) {
      this.printAboveSpinner(() => console.error(chalk.dim(`[debug] ${message}`)));
    }
  }

  /**
   * Logger for library code (embedding client retries, pipeline debug).
   */
  asLogger(): Logger {
    return {
      info: (message) => {
        if (!this.options.json) {
          this.printAboveSpinner(() => console.log(message));
        }
      },
      warn: (message) => this.warn(message),
      error: (message) => this.error(message),
      debug: (message) => this.debug(message),
    };
  }

  /**
   * Stop the spinner after a fatal error.
   */
  fail(message?: string): void {
    if (this.spinner) {
      if (message) {
        this.spinner.fail(message);
      } else {
        this.spinner.stop();
      }
      this.spinner = null;
    }
  }

  /**
   * Display the final summary after ingestion completes.
   */
  showSummary(result: IngestRunResult): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }

    const { stats } = result;

    if (this.options.json) {
      this.emitJson('complete', {
        filesProcessed: stats.filesProcessed,
        filesSkipped: stats.filesSkipped,
        chunksCreated: stats.chunksCreated,
        totalErrors: stats.totalErrors,
        startTime: stats.startTime.toISOString(),
        endTime: stats.endTime?.toISOString(),
        durationMs: result.durationMs,
        outputPath: result.outputPath,
        outputSize: result.outputSize,
        files: result.files,
      });
      return;
    }

    const output =
      result.outputSize === undefined
        ? result.outputPath
        : `${result.outputPath} (${this.formatBytes(result.outputSize)})`;

    console.log('');
    console.log(chalk.green.bold('Ingestion Complete ✓'));
    console.log('');
    console.log(`  ${chalk.dim('Files processed:')}  ${stats.filesProcessed.toLocaleString()}`);
    console.log(`  ${chalk.dim('Files skipped:')}    ${stats.filesSkipped.toLocaleString()}`);
    console.log(`  ${chalk.dim('Chunks created:')}   ${stats.chunksCreated.toLocaleString()}`);
    console.log(`  ${chalk.dim('Errors:')}           ${stats.totalErrors.toLocaleString()}`);
    console.log(`  ${chalk.dim('Time elapsed:')}     ${this.formatDuration(result.durationMs)}`);
    console.log(`  ${chalk.dim('Output:')}           ${output}`);

    if (stats.totalErrors > 0) {
      console.log('');
      console.log(chalk.yellow(`  ${stats.totalErrors} file(s) had errors`));
      if (this.options.verbose) {
        for (const error of result.errors.slice(0, 5)) {
          console.log(chalk.dim(`    - ${error}`));
        }
        if (result.errors.length > 5) {
          console.log(chalk.dim(`    ... and ${result.errors.length - 5} more`));
        }
      }
    }

    console.log('');
  }

  /**
   * Emit a JSON event to stdout.
   */
  private emitJson(type: IngestEventType, data: Record<string, unknown>): void {
    const event: IngestEvent = { type, timestamp: new Date().toISOString(), data };
    console.log(JSON.stringify(event));
  }

  private printAboveSpinner(print: () => void): void {
    if (this.spinner) {
      this.spinner.clear();
      print();
      this.spinner.render();
    } else {
      print();
    }
  }

  private describeOutcome(outcome: FileOutcome): string {
    switch (outcome.status) {
      case 'processed':
        return `${outcome.recordsWritten} record${outcome.recordsWritten === 1 ? '' : 's'}`;
      case 'empty':
        return 'no words';
      case 'skipped':
        return 'skipped';
      case 'failed':
        return `failed after ${outcome.recordsWritten}/${outcome.chunks} chunks`;
    }
  }

  /**
   * Truncate a file path to fit display width.
   */
  private truncatePath(path: string): string {
    if (path.length <= IngestReporter.MAX_PATH_LENGTH) {
      return path;
    }

    // Take the last MAX_PATH_LENGTH - 3 characters and prefix with ...
    return '...' + path.slice(-(IngestReporter.MAX_PATH_LENGTH - 3));
  }

  /**
   * Format milliseconds as human-readable duration.
   */
  private formatDuration(ms: number): string {
    if (ms < 1000) {
      return `${ms}ms`;
    }
    if (ms < 60000) {
      return `${(ms / 1000).toFixed(1)}s`;
    }
    const minutes = Math.floor(ms / 60000);
    const seconds = ((ms % 60000) / 1000).toFixed(0);
    return `${minutes}m ${seconds}s`;
  }

  /**
   * Format bytes as human-readable size.
   */
  private formatBytes(bytes: number): string {
    if (bytes < 1024) {
      return `${bytes} B`;
    }
    if (bytes < 1024 * 1024) {
      return `${(bytes / 1024).toFixed(1)} KB`;
    }
    return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
  }
}

/**
 * Create an IngestReporter with sensible defaults.
 *
 * @param options - Partial options (defaults will be applied)
 */
export function createIngestReporter(
  options: Partial<IngestReporterOptions> = {}
): IngestReporter {
  return new IngestReporter({
    json: options.json ?? false,
    verbose: options.verbose ?? false,
    noColor: options.noColor ?? !!process.env.NO_COLOR,
    isInteractive: options.isInteractive ?? (process.stdout.isTTY ?? false),
  });
}
