/**
 * Ingest Command
 *
 * Embeds every .txt file under a directory and appends one JSONL record
 * per chunk to the output file.
 *
 * Usage:
 *   textvec ingest <dir>                        Use config/default settings
 *   textvec ingest ./docs --chunk-size 200      Smaller chunks
 *   textvec ingest ./docs -o out/vectors.jsonl  Different output file
 *   textvec ingest ./docs --json                NDJSON progress events
 *
 * The pipeline:
 * 1. Health check - the embedding service must answer before anything is written
 * 2. Discovery - recursive *.txt search
 * 3. Per file - chunk, embed each chunk, append each record
 *
 * Ctrl+C stops at the next request or backoff wait. Records already
 * written stay in the output file.
 */

import { Command } from 'commander';

import type { CommandContext } from '../types.js';
import { createIngestReporter } from '../utils/progress.js';
import { IngestOptionsSchema, validateInput } from '../validation.js';
import { OllamaEmbeddingClient, runIngestPipeline } from '../../ingest/index.js';
import { resolveIngestConfig, validateIngestConfig } from '../../config/index.js';
import { CLIError } from '../../errors/index.js';

/**
 * Command-specific options, as Commander hands them over.
 */
interface IngestCommandOptions {
  model?: string;
  output?: string;
  chunkSize?: string;
  baseUrl?: string;
  timeout?: string;
  retries?: string;
}

/**
 * Create the ingest command.
 *
 * @param getContext - Factory function to get the command context
 * @returns Configured Commander command
 */
export function createIngestCommand(getContext: () => CommandContext): Command {
  return new Command('ingest')
    .argument('<directory>', 'Directory containing .txt files')
    .description('Chunk, embed and store every .txt file under a directory')
    .option('-m, --model <name>', 'Embedding model (default: nomic-embed-text)')
    .option('-o, --output <path>', 'JSONL output file (default: storage/vectors.jsonl)')
    .option('-c, --chunk-size <words>', 'Target words per chunk (default: 300)')
    .option('--base-url <url>', 'Embedding service URL (default: $OLLAMA_HOST or http://localhost:11434)')
    .option('--timeout <ms>', 'Per-request timeout in milliseconds (default: 30000)')
    .option('--retries <n>', 'Retries per failed embedding request (default: 3)')
    .action(async (directory: string, cmdOptions: IngestCommandOptions) => {
      const ctx = getContext();

      const parsed = validateInput(IngestOptionsSchema, cmdOptions);
      if (!parsed.success) {
        throw new CLIError(parsed.error, 'Run: textvec ingest --help  to see valid options');
      }

      const config = await validateIngestConfig(resolveIngestConfig(directory, parsed.data));

      ctx.debug(`Input directory: ${config.inputDir}`);
      ctx.debug(`Output file: ${config.outputPath}`);
      ctx.debug(
        `Embedding: ${config.model} at ${config.embedding.baseUrl} ` +
          `(timeout ${config.embedding.timeoutMs}ms, ${config.embedding.maxRetries} retries)`
      );

      const reporter = createIngestReporter({
        json: ctx.options.json,
        verbose: ctx.options.verbose,
      });
      const logger = reporter.asLogger();

      const client = new OllamaEmbeddingClient({
        model: config.model,
        baseUrl: config.embedding.baseUrl,
        timeoutMs: config.embedding.timeoutMs,
        maxRetries: config.embedding.maxRetries,
        backoffMs: config.embedding.backoffMs,
        logger,
      });

      // First Ctrl+C cancels cleanly, a second one exits immediately
      const controller = new AbortController();
      const onSigint = () => {
        if (controller.signal.aborted) {
          process.exit(130);
        }
        reporter.warn('Cancelling... (press Ctrl+C again to force quit)');
        controller.abort();
      };
      process.on('SIGINT', onSigint);

      reporter.start({
        inputDir: config.inputDir,
        outputPath: config.outputPath,
        model: config.model,
        chunkSize: config.chunkSize,
        baseUrl: config.embedding.baseUrl,
      });

      try {
        const result = await runIngestPipeline({
          inputDir: config.inputDir,
          outputPath: config.outputPath,
          chunkSize: config.chunkSize,
          client,
          logger,
          signal: controller.signal,

          // Wire up progress callbacks to the reporter
          onStateChange: (state) => reporter.setState(state),
          onFilesDiscovered: (total) => reporter.filesDiscovered(total),
          onFileStart: (file, index, total) => reporter.startFile(file.relativePath, index, total),
          onFileComplete: (outcome, index, total) => reporter.completeFile(outcome, index, total),
          onWarning: (message, context) => reporter.warn(message, context),
          onError: (error, context) => reporter.error(error.message, context),
        });

        reporter.showSummary(result);
      } catch (error) {
        reporter.fail();
        throw error;
      } finally {
        process.off('SIGINT', onSigint);
      }
    });
}
