/**
 * Error codes used throughout gitremap.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  | 'PatternError'
  // Runtime errors (exit code 1)
  | 'IOError'
  | 'UnknownError';

/**
 * Options for constructing an AppError.
 */
export interface AppErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional error details (structured or string) */
  details?: Record<string, unknown> | string;
}

/**
 * Base error class for all gitremap errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('IOError', 'Failed to read .git/config', {
 *   cause: originalError,
 *   details: { file: 'repo/.git/config' }
 * });
 * ```
 */
export class AppError extends Error {
  /** Error classification code */
  public readonly code: ErrorCode;
  /** Additional error details */
  public readonly details?: Record<string, unknown> | string;
  /** The underlying cause of this error */
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

/**
 * Error thrown when configuration is invalid or missing.
 * User-correctable - suggests fixing the configuration file.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when CLI usage is incorrect.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * Error thrown when a search fragment cannot be used inside the composite URI pattern.
 */
export class PatternCompileError extends AppError {
  /** Configuration field holding the fragment, e.g. `search.hostname` */
  public readonly field: string;
  /** The fragment as supplied */
  public readonly fragment: string;

  constructor(field: string, fragment: string, reason: string, options: AppErrorOptions = {}) {
    super('PatternError', `Config contains invalid regex "${fragment}" in ${field}: ${reason}`, {
      ...options,
      details: options.details ?? { field, fragment },
    });
    this.field = field;
    this.fragment = fragment;
  }
}

/**
 * Error raised when reading, writing or replacing a target file fails.
 * Scoped to one file: callers log it and move on to the next target.
 */
export class FileIOError extends AppError {
  /** Path of the file being processed */
  public readonly file: string;

  constructor(file: string, message: string, options: AppErrorOptions = {}) {
    super('IOError', `${message} ${file}: ${describeCause(options.cause)}`, {
      ...options,
      details: options.details ?? { file },
    });
    this.file = file;
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return cause === undefined ? 'unknown error' : String(cause);
}

/**
 * True for errors the user fixes by changing input (exit code 2).
 */
export function isUserCorrectable(error: unknown): boolean {
  return (
    error instanceof AppError &&
    (error.code === 'ConfigError' || error.code === 'UsageError' || error.code === 'PatternError')
  );
}
