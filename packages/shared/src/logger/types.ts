import type { RunEvent } from '../types/events';

/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Interface for logging throughout gitremap.
 * Supports both structured event logging and traditional log levels.
 * Every level writes to the diagnostic stream, never to the primary output.
 *
 * @example
 * ```typescript
 * logger.log({ type: 'ProjectUnmapped', ... });
 * logger.warn('The project "x" does not have a defined new path');
 * logger.error(new Error('Failed'), 'Operation failed');
 * const fileLogger = logger.child({ file: 'repo/.git/config' });
 * ```
 */
export interface Logger {
  /**
   * Persist a structured run event.
   * @param event - The event to log
   */
  log(event: RunEvent): MaybePromise<void>;

  /** Log a debug message (only shown with --verbose) */
  debug(message: string): MaybePromise<void>;
  /** Log an informational message */
  info(message: string): MaybePromise<void>;
  /** Log a warning message */
  warn(message: string): MaybePromise<void>;
  /**
   * Log an error with optional message.
   * @param error - The error that occurred
   * @param message - Optional additional context
   */
  error(error: Error, message?: string): MaybePromise<void>;

  /**
   * Create a child logger with additional context bindings.
   * All logs from the child will include these bindings.
   */
  child(bindings: Record<string, unknown>): Logger;
}
