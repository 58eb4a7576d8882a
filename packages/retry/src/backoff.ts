import { type DelaySource, type JitterMode, type RandomSource, addJitter, clamp } from '@hookwise/core';

/**
 * Absolute maximum delay to prevent integer overflow.
 * Set to 1 hour (3,600,000 ms) as a reasonable upper bound.
 */
export const ABSOLUTE_MAX_DELAY_MS = 3_600_000; // 1 hour

/**
 * Default delay schedule, consulted when no server-directed override is pending.
 */
export interface WaitStrategy {
  /** Short label used in logs */
  readonly name: string;
  /**
   * Delay before the attempt following `attempt`.
   *
   * @param attempt - The attempt that just failed (1-indexed)
   * @returns Delay in milliseconds
   */
  delay(attempt: number): number;
}

/**
 * A delay chosen for the next attempt and where it came from.
 */
export interface WaitDecision {
  readonly delay: number;
  readonly source: DelaySource;
}

/**
 * Choose the delay before the next attempt.
 *
 * A server-directed override takes precedence over the schedule. The caller
 * obtains it from `RetryState.takeAndClear`, so it applies exactly once.
 *
 * @param strategy - Default schedule
 * @param attempt - The attempt that just failed (1-indexed)
 * @param override - Pending server-directed delay in milliseconds
 */
export function nextDelay(
  strategy: WaitStrategy,
  attempt: number,
  override: number | undefined
): WaitDecision {
  if (override !== undefined) {
    return { delay: clamp(override, 0, ABSOLUTE_MAX_DELAY_MS), source: 'server' };
  }
  return { delay: strategy.delay(attempt), source: 'schedule' };
}

/**
 * Exponential backoff: `initialDelay * multiplier^(attempt-1)`, clamped to
 * `[minDelay, maxDelay]` and to {@link ABSOLUTE_MAX_DELAY_MS}.
 */
export function exponentialWait(options: {
  initialDelay: number;
  multiplier: number;
  minDelay: number;
  maxDelay: number;
}): WaitStrategy {
  const { initialDelay, multiplier, minDelay, maxDelay } = options;
  const upper = Math.min(maxDelay, ABSOLUTE_MAX_DELAY_MS);

  return {
    name: 'exponential',
    delay(attempt: number): number {
      // Attempt 1 = first retry, so we start from 0 for calculation
      const raw = initialDelay * Math.pow(multiplier, attempt - 1);
      return clamp(raw, minDelay, upper);
    },
  };
}

/**
 * Linear backoff: `initialDelay * attempt`, optionally capped.
 */
export function linearWait(options: { initialDelay: number; maxDelay?: number | undefined }): WaitStrategy {
  const upper = Math.min(options.maxDelay ?? ABSOLUTE_MAX_DELAY_MS, ABSOLUTE_MAX_DELAY_MS);

  return {
    name: 'linear',
    delay: (attempt) => Math.min(options.initialDelay * attempt, upper),
  };
}

/**
 * The same delay after every attempt.
 */
export function fixedWait(delay: number): WaitStrategy {
  const capped = Math.min(delay, ABSOLUTE_MAX_DELAY_MS);
  return {
    name: 'fixed',
    delay: () => capped,
  };
}

/**
 * A step chain: attempt `i` waits `delays[i - 1]`; the last step repeats.
 *
 * @example
 * ```typescript
 * // short waits first, longer ones later
 * const wait = chainWait([1000, 1000, 3000, 3000, 6000]);
 * wait.delay(3); // 3000
 * wait.delay(9); // 6000
 * ```
 */
export function chainWait(delays: readonly number[]): WaitStrategy {
  if (delays.length === 0) {
    throw new RangeError('chainWait requires at least one delay');
  }
  const steps = delays.map((d) => Math.min(d, ABSOLUTE_MAX_DELAY_MS));
  const last = steps[steps.length - 1] ?? 0;

  return {
    name: 'chain',
    delay(attempt: number): number {
      const index = Math.min(Math.max(attempt, 1), steps.length) - 1;
      return steps[index] ?? last;
    },
  };
}

/**
 * Randomize a schedule with jitter drawn from an explicit source.
 *
 * Only the schedule is jittered; server-directed overrides bypass it because
 * {@link nextDelay} never consults the strategy when one is pending.
 */
export function withJitter(
  strategy: WaitStrategy,
  mode: JitterMode,
  random: RandomSource
): WaitStrategy {
  return {
    name: `${strategy.name}+${mode}-jitter`,
    delay: (attempt) => addJitter(strategy.delay(attempt), mode, random),
  };
}
