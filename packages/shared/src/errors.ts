/**
 * Error codes used throughout synthloop.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Runtime errors (exit code 1)
  | 'ProviderError'
  | 'RateLimitError'
  | 'TimeoutError'
  | 'GenerationError'
  | 'PrimingError'
  | 'SandboxError'
  | 'RepairExhausted'
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
 * Base error class for all synthloop errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('ProviderError', 'API request failed', {
 *   cause: originalError,
 *   details: { statusCode: 500, provider: 'openai' }
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
 * Covers a missing model credential, which is fatal at startup.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when CLI or API usage is incorrect.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * Error thrown when an LLM provider fails.
 */
export class ProviderError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ProviderError', message, options);
  }
}

/**
 * Error thrown when rate limited by an API.
 * Includes optional retry-after information.
 */
export class RateLimitError extends AppError {
  /** Suggested wait time in seconds before retrying */
  public readonly retryAfter?: number;

  constructor(message: string, options: AppErrorOptions & { retryAfter?: number } = {}) {
    super('RateLimitError', message, options);
    this.retryAfter = options.retryAfter;
  }
}

/**
 * Error thrown when an operation times out.
 */
export class TimeoutError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('TimeoutError', message, options);
  }
}

/**
 * Error thrown when a stage cannot produce its output fields,
 * either because the model reply is malformed or the endpoint kept failing.
 */
export class GenerationError extends AppError {
  /** Name of the stage that failed */
  public readonly stage: string;

  constructor(stage: string, message: string, options: AppErrorOptions = {}) {
    super('GenerationError', `Stage "${stage}": ${message}`, options);
    this.stage = stage;
  }
}

/**
 * Error thrown when a stage cannot be primed from the example bank.
 * The pipeline cannot be constructed.
 */
export class PrimingError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('PrimingError', message, options);
  }
}

/**
 * Error thrown when the execution sandbox itself breaks,
 * as opposed to the program under test failing.
 */
export class SandboxError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('SandboxError', message, options);
  }
}

/**
 * Error thrown when the repair loop reaches its attempt bound
 * while the candidate still fails.
 */
export class RepairExhaustedError extends AppError {
  /** Number of repair iterations that were run */
  public readonly attempts: number;

  constructor(attempts: number, options: AppErrorOptions = {}) {
    super('RepairExhausted', `Code still failing after ${attempts} repair attempt(s)`, options);
    this.attempts = attempts;
  }
}
