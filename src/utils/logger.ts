/**
 * Logger Interface for Library Code
 *
 * The ingest pipeline, embedding client and scanner never touch the
 * console directly. They accept a Logger via dependency injection:
 * - CLI code: passes a chalk-backed logger built from the command context
 * - Test code: passes silentLogger or a vi.fn()-backed mock
 */

/**
 * Generic logger interface for library code
 */
export interface Logger {
  /** Progress and lifecycle messages */
  info: (message: string) => void;
  /** Recoverable problems (retries, skipped paths) */
  warn: (message: string) => void;
  /** Failures the caller chose to survive */
  error: (message: string) => void;
  /** Log a debug message (optional - not all contexts need debug) */
  debug?: (message: string) => void;
}

/**
 * Default console logger for use when no logger is injected.
 * Everything goes to stderr so stdout stays free for --json events.
 */
export const consoleLogger: Logger = {
  info: (message: string) => console.error(message),
  warn: (message: string) => console.warn(message),
  error: (message: string) => console.error(message),
};

/**
 * Silent logger for tests or when logging should be suppressed.
 */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};
