import { type Attempt } from './outcome.js';

/**
 * Base error class for all hookwise errors.
 */
export class HookwiseError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'HookwiseError';
    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Interface for errors that can indicate whether they are retryable.
 */
export interface RetryableError {
  readonly retryable: boolean;
}

/**
 * Type guard to check if an error implements RetryableError interface.
 */
export function isRetryableError(error: unknown): error is Error & RetryableError {
  return (
    error instanceof Error &&
    'retryable' in error &&
    typeof error.retryable === 'boolean'
  );
}

/**
 * Check if an error is retryable.
 * Returns undefined if the error doesn't implement RetryableError (let caller decide).
 */
export function isRetryable(error: unknown): boolean | undefined {
  if (isRetryableError(error)) {
    return error.retryable;
  }
  return undefined;
}

/**
 * The remote server answered with a 5xx status.
 */
export class TransientServerError extends HookwiseError implements RetryableError {
  public readonly retryable = true;
  public readonly statusCode: number;

  constructor(statusCode: number, message = `Server error: ${String(statusCode)}`) {
    super(message);
    this.name = 'TransientServerError';
    this.statusCode = statusCode;
  }
}

/**
 * The remote server answered 429 Too Many Requests.
 */
export class RateLimitedError extends HookwiseError implements RetryableError {
  public readonly retryable = true;
  public readonly statusCode = 429;
  /** Server-directed delay in milliseconds, when the response carried one */
  public readonly retryAfter: number | undefined;

  constructor(message = 'Rate limited', retryAfter?: number) {
    super(message);
    this.name = 'RateLimitedError';
    this.retryAfter = retryAfter;
  }
}

/**
 * The remote server rejected the request with a status that retrying cannot fix.
 */
export class ClientRejectedError extends HookwiseError implements RetryableError {
  public readonly retryable = false;
  public readonly statusCode: number;

  constructor(statusCode: number, message = `Request rejected: ${String(statusCode)}`) {
    super(message);
    this.name = 'ClientRejectedError';
    this.statusCode = statusCode;
  }
}

/**
 * Connection-level failure raised by a transport before any status was received.
 */
export class TransportError extends HookwiseError implements RetryableError {
  public readonly retryable = true;

  constructor(message = 'Transport failure', cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'TransportError';
  }
}

/**
 * Raised when a retry run stops without a successful attempt.
 *
 * Carries the reason of the last outcome and every attempt of the run, so a
 * single terminal error describes the whole delivery.
 */
export class RetryTerminationError extends HookwiseError {
  public readonly reason: string;
  public readonly attempts: readonly Attempt[];
  public readonly lastError: Error | undefined;

  constructor(
    message: string,
    reason: string,
    attempts: readonly Attempt[],
    lastError?: Error
  ) {
    super(message, lastError === undefined ? undefined : { cause: lastError });
    this.name = 'RetryTerminationError';
    this.reason = reason;
    this.attempts = attempts;
    this.lastError = lastError;
  }

  get attemptCount(): number {
    return this.attempts.length;
  }
}

/**
 * Every attempt allowed by the policy ended in a retryable failure.
 */
export class RetriesExhaustedError extends RetryTerminationError {
  constructor(reason: string, attempts: readonly Attempt[], lastError?: Error) {
    super(
      `Retries exhausted after ${String(attempts.length)} attempts: ${reason}`,
      reason,
      attempts,
      lastError
    );
    this.name = 'RetriesExhaustedError';
  }
}

/**
 * An attempt ended in a failure that must not be retried.
 */
export class FatalFailureError extends RetryTerminationError {
  constructor(reason: string, attempts: readonly Attempt[], lastError?: Error) {
    super(
      `Fatal failure on attempt ${String(attempts.length)}: ${reason}`,
      reason,
      attempts,
      lastError
    );
    this.name = 'FatalFailureError';
  }
}

/**
 * Configuration could not be read or did not validate.
 */
export class ConfigError extends HookwiseError {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'ConfigError';
  }
}

/**
 * A delivery named a target that is not configured.
 */
export class UnknownTargetError extends HookwiseError {
  public readonly target: string;

  constructor(target: string) {
    super(`Unknown webhook target: ${target}`);
    this.name = 'UnknownTargetError';
    this.target = target;
  }
}
