import { type Attempt, FatalFailureError, type RetryTerminationError } from '@hookwise/core';

/**
 * How a retry run ended.
 */
export type RunResult = 'succeeded' | 'exhausted' | 'fatal';

/**
 * Summary of one retry run, derived from its attempt sequence.
 */
export interface RetryStatistics {
  readonly attemptCount: number;
  /** Sum of all delays waited between attempts (ms) */
  readonly totalDelay: number;
  /** Number of delays that came from a server hint rather than the schedule */
  readonly serverDirectedDelays: number;
  readonly firstStartedAt: number | undefined;
  readonly lastStartedAt: number | undefined;
  /** Time between the first and the last attempt start (ms) */
  readonly elapsed: number;
  readonly result: RunResult;
}

/**
 * Summarize an attempt sequence.
 *
 * @param attempts - Attempts of one run, in order
 * @param result - How the run ended
 */
export function summarizeAttempts(
  attempts: readonly Attempt[],
  result: RunResult
): RetryStatistics {
  let totalDelay = 0;
  let serverDirectedDelays = 0;

  for (const attempt of attempts) {
    totalDelay += attempt.delay ?? 0;
    if (attempt.delaySource === 'server') {
      serverDirectedDelays++;
    }
  }

  const first = attempts[0];
  const last = attempts[attempts.length - 1];

  return {
    attemptCount: attempts.length,
    totalDelay,
    serverDirectedDelays,
    firstStartedAt: first?.startedAt,
    lastStartedAt: last?.startedAt,
    elapsed: first && last ? last.startedAt - first.startedAt : 0,
    result,
  };
}

/**
 * Summarize a run that ended with a terminal error.
 */
export function summarizeTermination(error: RetryTerminationError): RetryStatistics {
  return summarizeAttempts(error.attempts, error instanceof FatalFailureError ? 'fatal' : 'exhausted');
}
