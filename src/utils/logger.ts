/**
 * Logger interface for library code
 *
 * Library code accepts a Logger through its options; the CLI passes its
 * CommandContext (which satisfies this shape) and tests pass silentLogger or
 * a vi.fn() spy.
 */

export interface Logger {
  /** Log a warning message */
  warn: (message: string) => void;
  /** Progress and summary lines */
  info?: (message: string) => void;
  /** Log a debug message (not all contexts need debug) */
  debug?: (message: string) => void;
  /** Failures that were handled but should be visible */
  error?: (message: string) => void;
}

/**
 * Default console logger for use when no logger is injected.
 * Everything goes to stderr so stdout stays clean for command output.
 */
export const consoleLogger: Logger = {
  warn: (message: string) => console.warn(message),
  info: (message: string) => console.error(message),
  debug: () => {},
  error: (message: string) => console.error(message),
};

/**
 * Silent logger for tests or when logging should be suppressed.
 */
export const silentLogger: Logger = {
  warn: () => {},
  info: () => {},
  debug: () => {},
  error: () => {},
};

/**
 * Log at error level, falling back to warn for loggers without `error`.
 */
export function logError(logger: Logger, message: string): void {
  if (logger.error) {
    logger.error(message);
  } else {
    logger.warn(message);
  }
}
