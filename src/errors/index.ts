/**
 * Error handling module for the textvec CLI
 *
 * This module exports:
 * - Custom error classes for fatal error types
 * - Error formatting and handling utilities
 *
 * Usage:
 *   import { ConfigError, handleError } from './errors/index.js';
 *
 *   throw new ConfigError('Chunk size must be positive', 'Pass --chunk-size 300');
 */

// Error types
export {
  CLIError,
  FileNotFoundError,
  ConfigError,
  ValidationError,
  OutputError,
  ConnectivityError,
  CancelledError,
} from './types.js';

// Error handling utilities
export {
  formatError,
  getExitCode,
  handleError,
  createGlobalErrorHandler,
  type ErrorHandlerOptions,
  type ErrorOutput,
} from './handler.js';
