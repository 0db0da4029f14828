/**
 * Error codes used throughout rebisect.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Runtime errors (exit code 1)
  | 'BuildError'
  | 'VerdictError'
  | 'CacheError'
  | 'ProcessError'
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
 * Base error class for all rebisect errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('ProcessError', 'git rev-list failed', {
 *   cause: originalError,
 *   details: { exitCode: 128 }
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
 * User-correctable - suggests fixing configuration files.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when CLI usage or caller input is incorrect.
 * User-correctable - suggests correct usage.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * Error thrown when a dry run or a real build cannot complete at a revision.
 * Nothing is cached for the revision; retrying is the caller's decision.
 */
export class BuildFailureError extends AppError {
  /** Revision the build was attempted at */
  public readonly revision: string;
  /** Argument vector of the build command */
  public readonly argv: string[];
  /** Exit code of the build process, when it ran */
  public readonly exitCode?: number;

  constructor(
    revision: string,
    argv: string[],
    message: string,
    options: AppErrorOptions & { exitCode?: number } = {},
  ) {
    super('BuildError', `Build failed at ${revision}: ${message}`, {
      ...options,
      details: {
        revision,
        command: argv.join(' '),
        ...(options.exitCode !== undefined ? { exitCode: options.exitCode } : {}),
        ...(typeof options.details === 'object' ? options.details : {}),
      },
    });
    this.revision = revision;
    this.argv = argv;
    this.exitCode = options.exitCode;
  }
}

/**
 * Error thrown when the verdicts collected so far leave no candidate revision,
 * or when a verdict did not narrow the candidate range.
 */
export class InconsistentVerdictsError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('VerdictError', message, options);
  }
}

/**
 * Error describing a stored cost record that cannot be decoded.
 * Stores report it and treat the record as a miss.
 */
export class CacheCorruptionError extends AppError {
  /** Location of the record, e.g. `costs.jsonl:12` */
  public readonly location: string;

  constructor(location: string, message: string, options: AppErrorOptions = {}) {
    super('CacheError', `Corrupt cache record at ${location}: ${message}`, options);
    this.location = location;
  }
}

/**
 * Error thrown when a subprocess fails.
 * Includes the process exit code when available.
 */
export class ProcessError extends AppError {
  /** Exit code of the failed process */
  public readonly exitCode?: number;

  constructor(message: string, options: AppErrorOptions & { exitCode?: number } = {}) {
    super('ProcessError', message, options);
    this.exitCode = options.exitCode;
  }
}

/**
 * True for errors the user can fix by changing their input or configuration.
 */
export function isUserError(error: unknown): boolean {
  return error instanceof ConfigError || error instanceof UsageError;
}

/**
 * Process exit code for an error escaping to the CLI.
 */
export function exitCodeFor(error: unknown): number {
  return isUserError(error) ? 2 : 1;
}
