#!/usr/bin/env node
/**
 * textvec CLI Entry Point
 *
 * This is the main entry point for the `textvec` command.
 * It sets up Commander.js with global options and registers all subcommands.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { GlobalOptions } from './types.js';
import { createContext } from './context.js';
import { createIngestCommand } from './commands/ingest.js';
import { createCheckCommand } from './commands/check.js';
import { createConfigCommand } from './commands/config.js';
import {
  handleError,
  createGlobalErrorHandler,
  CLIError,
} from '../errors/index.js';

const VERSION = process.env.CLI_VERSION ?? '0.0.0';

// Create the root program
const program = new Command();

// Configure the program
program
  .name('textvec')
  .description('Turn a directory of text files into embedding records (JSONL)')
  .version(VERSION, '-v, --version', 'Display version number')

  // Global options - available to ALL subcommands
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output results as JSON', false)

  // Custom help formatting
  .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan('textvec check')}                          Check the embedding service is up
  ${chalk.cyan('textvec ingest ./notes')}                 Embed every .txt file under ./notes
  ${chalk.cyan('textvec ingest ./notes --chunk-size 200')} Use smaller chunks
  ${chalk.cyan('textvec config list')}                    Show all configuration
  ${chalk.cyan('textvec config set model all-minilm')}    Change a setting
`);

/**
 * Get global options from the program
 * Commander stores options on the Command object after parsing
 */
function getGlobalOptions(): GlobalOptions {
  const opts = program.opts<Partial<GlobalOptions>>();
  return {
    verbose: opts.verbose ?? false,
    json: opts.json ?? false,
  };
}

// Ingest command - the pipeline
program.addCommand(createIngestCommand(() => createContext(getGlobalOptions())));

// Check command - embedding service health
program.addCommand(createCheckCommand(() => createContext(getGlobalOptions())));

// Config command - manage config.toml
program.addCommand(createConfigCommand(() => createContext(getGlobalOptions())));

// ============================================================================
// ERROR HANDLING & EXECUTION
// ============================================================================

// Handle unknown commands gracefully
program.on('command:*', (operands: string[]) => {
  throw new CLIError(
    `Unknown command: ${operands[0]}`,
    `Run: textvec --help  to see available commands`
  );
});

// Parse arguments and execute
async function main(): Promise<void> {
  // Options are read lazily so --verbose/--json apply once parsed
  const getErrorOptions = () => {
    const opts = getGlobalOptions();
    return { verbose: opts.verbose, json: opts.json };
  };

  // Set up global error handlers for uncaught exceptions
  // These catch errors that escape all try/catch blocks
  const globalHandler = (error: unknown) => createGlobalErrorHandler(getErrorOptions())(error);
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getErrorOptions());
  }
}

void main();
