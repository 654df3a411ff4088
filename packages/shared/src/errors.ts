/**
 * Error codes used throughout the arena.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Runtime errors (exit code 1)
  | 'CorpusError'
  | 'QuotaExceeded'
  | 'SessionTerminated'
  | 'FatalError'
  | 'ProviderError'
  | 'ToolCallError'
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
 * Base error class for all arena errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * Faults produced by the program under test (compile errors, crashes,
 * timeouts, checker failures) are never thrown; they are carried as
 * structured outcomes. Only harness-level problems become AppErrors.
 *
 * @example
 * ```typescript
 * throw new AppError('CorpusError', 'tests directory is missing', {
 *   details: { problemDir: '/problems/nile' },
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
 * Error thrown when CLI usage is incorrect.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * Error thrown when a problem corpus cannot be read or violates its invariants
 * (overlapping subtasks, orphan tests, point totals that do not add up).
 */
export class CorpusValidationError extends AppError {
  /** Every violation found, one per line */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], options: AppErrorOptions = {}) {
    super('CorpusError', issues.length > 0 ? `${message}\n- ${issues.join('\n- ')}` : message, options);
    this.issues = issues;
  }
}

export type QuotaKind = 'submissions' | 'turns';

/**
 * Error thrown when a session ceiling has already been reached.
 * Terminal for the action that hit it.
 */
export class QuotaExceededError extends AppError {
  public readonly quota: QuotaKind;
  public readonly limit: number;
  public readonly used: number;

  constructor(quota: QuotaKind, limit: number, used: number, options: AppErrorOptions = {}) {
    super('QuotaExceeded', `Maximum ${quota} (${limit}) exceeded.`, {
      ...options,
      details: { quota, limit, used },
    });
    this.quota = quota;
    this.limit = limit;
    this.used = used;
  }
}

/**
 * Error thrown when an action reaches a session that has already terminated.
 */
export class SessionTerminatedError extends AppError {
  public readonly reason: string;

  constructor(reason: string, options: AppErrorOptions = {}) {
    super('SessionTerminated', `Session already terminated (${reason})`, options);
    this.reason = reason;
  }
}

/**
 * Unexpected internal failure. Ends the session with reason `fatal_error`.
 */
export class FatalError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('FatalError', message, options);
  }
}

/**
 * Error thrown when a model provider fails.
 */
export class ProviderError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ProviderError', message, options);
  }
}

/**
 * Error thrown when a model's tool call cannot be parsed.
 * The conversation loop drops the reply and asks again.
 */
export class ToolCallError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ToolCallError', message, options);
  }
}

export function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}
