/**
 * Config Command
 *
 * Manages config.toml via CLI:
 *   textvec config get <key>         - Get a specific value
 *   textvec config set <key> <value> - Set a value
 *   textvec config list              - Show all configuration
 *   textvec config path              - Show config file location
 *   textvec config reset --force     - Restore the default file
 */

import { Command } from 'commander';
import chalk from 'chalk';
import {
  getConfigValue,
  setConfigValue,
  listConfig,
  getConfigPath,
  resetConfig,
} from '../../config/index.js';
import { getExitCode } from '../../errors/index.js';
import type { CommandContext } from '../types.js';

/**
 * Create the config command with all subcommands
 */
export function createConfigCommand(getContext: () => CommandContext): Command {
  const configCmd = new Command('config')
    .description('Manage configuration settings');

  // textvec config get <key>
  configCmd
    .command('get <key>')
    .description('Get a configuration value (e.g., textvec config get embedding.base_url)')
    .action((key: string) => {
      const ctx = getContext();

      try {
        const value = getConfigValue(key);

        if (value === undefined) {
          ctx.error(`Unknown config key: ${key}`);
          ctx.log('');
          ctx.log(`Run ${chalk.cyan('textvec config list')} to see all available keys.`);
          process.exitCode = 1;
          return;
        }

        if (ctx.options.json) {
          console.log(JSON.stringify({ key, value }));
        } else {
          ctx.log(formatValue(value));
        }
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  // textvec config set <key> <value>
  configCmd
    .command('set <key> <value>')
    .description('Set a configuration value (e.g., textvec config set chunk_size 200)')
    // Values such as "-5" reach the schema instead of failing as unknown options
    .allowUnknownOption()
    .action((key: string, value: string) => {
      const ctx = getContext();

      try {
        setConfigValue(key, value);

        if (ctx.options.json) {
          console.log(JSON.stringify({ success: true, key, value: getConfigValue(key) }));
        } else {
          ctx.log(`${chalk.green('✓')} Set ${chalk.cyan(key)} = ${chalk.yellow(value)}`);
        }
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  // textvec config list
  configCmd
    .command('list')
    .alias('ls')
    .description('List all configuration values')
    .action(() => {
      const ctx = getContext();

      try {
        const entries = listConfig();

        if (ctx.options.json) {
          console.log(JSON.stringify(Object.fromEntries(entries), null, 2));
          return;
        }

        ctx.log(chalk.bold('Configuration:'));
        ctx.log('');

        // Group by top-level key for readability
        let currentGroup = '';
        for (const [key, value] of entries) {
          const group = key.includes('.') ? (key.split('.')[0] ?? '') : '';

          // Add spacing between groups
          if (group !== currentGroup) {
            ctx.log('');
            currentGroup = group;
          }

          ctx.log(`  ${chalk.cyan(key)} = ${chalk.yellow(formatValue(value))}`);
        }

        ctx.log('');
        ctx.log(chalk.dim(`Config file: ${getConfigPath()}`));
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  // textvec config path
  configCmd
    .command('path')
    .description('Show the config file location')
    .action(() => {
      const ctx = getContext();
      const configPath = getConfigPath();

      if (ctx.options.json) {
        console.log(JSON.stringify({ path: configPath }));
      } else {
        ctx.log(configPath);
      }
    });

  // textvec config reset
  configCmd
    .command('reset')
    .description('Reset configuration to defaults')
    .option('-f, --force', 'Skip confirmation prompt')
    .action((options: { force?: boolean }) => {
      const ctx = getContext();

      if (!options.force && !ctx.options.json) {
        ctx.log(chalk.yellow('This will reset all configuration to defaults.'));
        ctx.log(`Run with ${chalk.cyan('--force')} to confirm.`);
        process.exitCode = 1;
        return;
      }

      try {
        const configPath = resetConfig();

        if (ctx.options.json) {
          console.log(JSON.stringify({ success: true, path: configPath }));
        } else {
          ctx.log(`${chalk.green('✓')} Configuration reset to defaults`);
        }
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  return configCmd;
}

/**
 * Format a value for display
 */
function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'number') return String(value);
  return JSON.stringify(value);
}

/**
 * Handle config errors with user-friendly messages
 */
function handleConfigError(ctx: CommandContext, error: unknown): void {
  const message = error instanceof Error ? error.message : 'Unknown error';

  ctx.error(message);

  process.exitCode = getExitCode(error);
}
