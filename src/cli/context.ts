/**
 * Command context factory
 */

import chalk from 'chalk';
import type { CommandContext, GlobalOptions } from './types.js';

/**
 * Create a command context with logging utilities.
 *
 * Human-readable text goes to stderr so that stdout carries only
 * command results (and the NDJSON stream under --json).
 */
export function createContext(options: GlobalOptions): CommandContext {
  return {
    options,
    log: (message: string) => {
      if (!options.json) {
        console.log(message);
      }
    },
    debug: (message: string) => {
      if (options.verbose && !options.json) {
        console.error(chalk.dim(`[debug] ${message}`));
      }
    },
    warn: (message: string) => {
      if (!options.json) {
        console.warn(chalk.yellow(`Warning: ${message}`));
      }
    },
    error: (message: string) => {
      if (options.json) {
        console.error(JSON.stringify({ error: message }));
      } else {
        console.error(chalk.red(`Error: ${message}`));
      }
    },
  };
}
