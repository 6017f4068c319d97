/**
 * Error codes used throughout starsift.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  | 'ValidationError'
  // Runtime errors (exit code 1)
  | 'NetworkError'
  | 'RateLimitError'
  | 'NotFoundError'
  | 'HttpError'
  | 'IOError'
  | 'ParseError'
  | 'ProviderError'
  | 'UnknownError';

const USER_CORRECTABLE: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
  'ConfigError',
  'UsageError',
  'ValidationError',
]);

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
 * Base error class for all starsift errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('NetworkError', 'Starred probe failed', {
 *   cause: originalError,
 *   details: { url },
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
 * Error thrown when an argument handed to the core is unusable,
 * e.g. an empty user handle or an all-zero fingerprint.
 */
export class ValidationError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ValidationError', message, options);
  }
}

/**
 * Error thrown when the transport fails before any HTTP status is available
 * (DNS, refused connection, reset socket).
 */
export class NetworkError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('NetworkError', message, options);
  }
}

export interface RateLimitInfo {
  /** Requests used in the current window (`X-RateLimit-Used`) */
  used?: string;
  /** Requests left in the current window (`X-RateLimit-Remaining`) */
  remaining?: string;
  /** Epoch seconds when the window resets (`X-RateLimit-Reset`) */
  reset?: string;
}

/**
 * Error thrown when GitHub answers 403.
 * Carries the rate-limit headers so a caller can decide on a backoff;
 * nothing in starsift retries.
 */
export class RateLimitError extends AppError {
  public readonly used?: string;
  public readonly remaining?: string;
  public readonly reset?: string;

  constructor(message: string, options: AppErrorOptions & RateLimitInfo = {}) {
    super('RateLimitError', message, {
      cause: options.cause,
      details: options.details ?? {
        used: options.used,
        remaining: options.remaining,
        reset: options.reset,
      },
    });
    this.used = options.used;
    this.remaining = options.remaining;
    this.reset = options.reset;
  }
}

/**
 * Error thrown when GitHub answers 404 (unknown user or hidden stars).
 */
export class NotFoundError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('NotFoundError', message, options);
  }
}

/**
 * Error thrown for any other non-200 HTTP status.
 */
export class UnexpectedStatusError extends AppError {
  /** HTTP status code of the response */
  public readonly status: number;

  constructor(status: number, options: AppErrorOptions = {}) {
    super('HttpError', `Unexpected HTTP status code: ${status}`, options);
    this.status = status;
  }
}

/**
 * Error thrown when the cache file cannot be read or written.
 */
export class IOError extends AppError {
  /** File the operation targeted */
  public readonly path: string;

  constructor(path: string, message: string, options: AppErrorOptions = {}) {
    super('IOError', message, options);
    this.path = path;
  }
}

/**
 * Error thrown when a dataset payload is not a list of repository records.
 */
export class ParseError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ParseError', message, options);
  }
}

/**
 * Error thrown when the dataset provider cannot deliver the starred listing.
 */
export class ProviderError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ProviderError', message, options);
  }
}

/**
 * Process exit code for an error reaching the top level.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof AppError && USER_CORRECTABLE.has(error.code)) {
    return 2;
  }
  return 1;
}
