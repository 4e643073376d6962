/**
 * Utilities Module
 *
 * Shared utility functions used across the codebase.
 */

// Injected logging
export {
  consoleLogger,
  silentLogger,
  type Logger,
} from './logger.js';

// Cancellable delay
export { sleep, type DelayFn } from './delay.js';
