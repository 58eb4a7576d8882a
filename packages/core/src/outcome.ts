/**
 * The attempt produced a usable result.
 */
export interface SuccessOutcome<T> {
  readonly kind: 'success';
  readonly body: T;
}

/**
 * The attempt failed in a way that another attempt may fix.
 */
export interface RetryableFailure {
  readonly kind: 'retryable';
  readonly reason: string;
  /** Delay in milliseconds the remote side asked for, if any */
  readonly suggestedDelay: number | undefined;
  readonly error: Error | undefined;
}

/**
 * The attempt failed in a way that retrying cannot fix.
 */
export interface FatalFailure {
  readonly kind: 'fatal';
  readonly reason: string;
  readonly error: Error | undefined;
}

/**
 * Classification of a single attempt's result.
 *
 * @template T - The success body type
 */
export type Outcome<T> = SuccessOutcome<T> | RetryableFailure | FatalFailure;

export type OutcomeKind = Outcome<unknown>['kind'];

/**
 * Where the delay scheduled after an attempt came from.
 */
export type DelaySource = 'server' | 'schedule';

/**
 * One execution of a retried operation plus its classified result.
 *
 * @template T - The success body type
 */
export interface Attempt<T = unknown> {
  /** 1-based attempt number */
  readonly index: number;
  /** Timestamp (ms) at which the attempt started */
  readonly startedAt: number;
  readonly outcome: Outcome<T>;
  /** Delay in milliseconds waited after this attempt, undefined when the run ended here */
  readonly delay: number | undefined;
  readonly delaySource: DelaySource | undefined;
}

export function success<T>(body: T): SuccessOutcome<T> {
  const outcome: SuccessOutcome<T> = { kind: 'success', body };
  return Object.freeze(outcome);
}

/**
 * Build a retryable failure.
 *
 * `suggestedDelay` only records what the remote side asked for. To make the
 * executor honor it, the caller stores it in its `RetryState` under the
 * operation id before returning the outcome.
 */
export function retryable(
  reason: string,
  options: { suggestedDelay?: number; error?: Error } = {}
): RetryableFailure {
  const outcome: RetryableFailure = {
    kind: 'retryable',
    reason,
    suggestedDelay: options.suggestedDelay,
    error: options.error,
  };
  return Object.freeze(outcome);
}

export function fatal(reason: string, error?: Error): FatalFailure {
  const outcome: FatalFailure = { kind: 'fatal', reason, error };
  return Object.freeze(outcome);
}

export function isSuccess<T>(outcome: Outcome<T>): outcome is SuccessOutcome<T> {
  return outcome.kind === 'success';
}

export function isRetryableFailure<T>(outcome: Outcome<T>): outcome is RetryableFailure {
  return outcome.kind === 'retryable';
}

export function isFatalFailure<T>(outcome: Outcome<T>): outcome is FatalFailure {
  return outcome.kind === 'fatal';
}
