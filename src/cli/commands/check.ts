/**
 * Check Command
 *
 * Pre-flight check that the embedding service answers:
 *   textvec check                 - Check the configured service
 *   textvec check --base-url URL  - Check a different service
 *   textvec check --json          - Output as JSON (for scripts)
 *
 * Exits 0 when reachable, 6 when not.
 */

import { Command } from 'commander';
import chalk from 'chalk';

import { contextLogger, type CommandContext } from '../types.js';
import { CheckOptionsSchema, validateInput } from '../validation.js';
import { OllamaEmbeddingClient } from '../../ingest/index.js';
import { HttpUrlSchema, loadConfig, resolveBaseUrl } from '../../config/index.js';
import { CLIError, ValidationError } from '../../errors/index.js';

interface CheckResultJSON {
  reachable: boolean;
  baseUrl: string;
  model: string;
  durationMs: number;
}

/**
 * Create the check command
 */
export function createCheckCommand(getContext: () => CommandContext): Command {
  return new Command('check')
    .description('Check that the embedding service is reachable')
    .option('--base-url <url>', 'Embedding service URL to check')
    .action(async (cmdOptions: { baseUrl?: string }) => {
      const ctx = getContext();

      const parsed = validateInput(CheckOptionsSchema, cmdOptions);
      if (!parsed.success) {
        throw new CLIError(parsed.error);
      }

      const config = loadConfig();
      const baseUrl = resolveBaseUrl(parsed.data.baseUrl, config);

      const url = HttpUrlSchema.safeParse(baseUrl);
      if (!url.success) {
        throw new ValidationError(
          `Invalid base URL: ${baseUrl}`,
          url.error.issues.map((issue) => issue.message)
        );
      }

      ctx.debug(`Probing ${baseUrl}/api/tags`);

      const client = new OllamaEmbeddingClient({
        model: config.model,
        baseUrl,
        timeoutMs: config.embedding.timeout_ms,
        logger: contextLogger(ctx),
      });

      const started = performance.now();
      await client.healthCheck();
      const durationMs = Math.round(performance.now() - started);

      if (ctx.options.json) {
        const result: CheckResultJSON = {
          reachable: true,
          baseUrl: client.baseUrl,
          model: client.model,
          durationMs,
        };
        console.log(JSON.stringify(result, null, 2));
        return;
      }

      ctx.log(
        `${chalk.green('✓')} Embedding service reachable at ${chalk.cyan(client.baseUrl)} ${chalk.dim(`(${durationMs}ms)`)}`
      );
      ctx.log(chalk.dim(`  Model: ${client.model}`));
    });
}
