import {
  type Attempt,
  type Clock,
  type HookwiseLogger,
  type Outcome,
  type RetryableOperation,
  type Sleeper,
  FatalFailureError,
  RetriesExhaustedError,
  abortReason,
  noopLogger,
  sleep,
  throwIfAborted,
} from '@hookwise/core';
import { type RetryPolicy, type RetryPolicyInput, createRetryPolicy } from './config.js';
import { type WaitDecision, nextDelay } from './backoff.js';
import { RetryState } from './state.js';
import { type RetryStatistics, type RunResult, summarizeAttempts } from './statistics.js';

/**
 * Options for constructing a {@link RetryExecutor}.
 */
export interface RetryExecutorOptions<T> extends RetryPolicyInput<T> {
  /** Prebuilt policy; when given, the policy fields above are ignored */
  policy?: RetryPolicy<T>;
  /** Logger instance for structured logging */
  logger?: HookwiseLogger;
  /** Suspends between attempts (default: timer-based sleep) */
  sleep?: Sleeper;
  /** Timestamps recorded on attempts (default: Date.now) */
  clock?: Clock;
}

/**
 * Per-run options for {@link RetryExecutor.execute}.
 */
export interface ExecuteOptions<T> {
  /** Cancels before the next attempt or during a pending delay */
  signal?: AbortSignal;
  /** Where the operation stores server-directed overrides (default: a fresh state) */
  state?: RetryState;
  /** Called after each attempt is recorded */
  onAttempt?: (attempt: Attempt<T>) => void;
}

/**
 * Result of a successful run along with its attempt history.
 */
export interface RunReport<T> {
  readonly value: T;
  readonly attempts: readonly Attempt<T>[];
  readonly statistics: RetryStatistics;
}

/**
 * Drives the attempt loop for operations that classify their own outcome.
 *
 * Each attempt runs the operation once. A success returns its body, a fatal
 * failure stops at once, and a retryable failure waits before the next
 * attempt until the policy's budget is spent. The wait comes from a pending
 * server-directed override in the run's {@link RetryState} if there is one,
 * otherwise from the policy's schedule.
 *
 * @template T - The success body type
 *
 * @example
 * ```typescript
 * const executor = new RetryExecutor<string>({ maxAttempts: 4 });
 * const state = new RetryState();
 *
 * const body = await executor.execute(
 *   {
 *     id: 'alerts',
 *     run: async () => {
 *       const response = await transport.send(url, payload, headers);
 *       const outcome = classifyResponse(response.statusCode, response.headers, response.bodyText);
 *       if (outcome.kind === 'retryable' && outcome.suggestedDelay !== undefined) {
 *         state.set('alerts', outcome.suggestedDelay);
 *       }
 *       return outcome;
 *     },
 *   },
 *   { state }
 * );
 * ```
 */
export class RetryExecutor<T> {
  private readonly policy: RetryPolicy<T>;
  private readonly logger: HookwiseLogger;
  private readonly sleep: Sleeper;
  private readonly clock: Clock;

  constructor(options: RetryExecutorOptions<T> = {}) {
    const { policy, logger, sleep: sleeper, clock, ...policyInput } = options;
    this.policy = policy ?? createRetryPolicy(policyInput);
    this.logger = logger ?? noopLogger;
    this.sleep = sleeper ?? sleep;
    this.clock = clock ?? Date.now;
  }

  /**
   * Execute an operation with retry logic.
   *
   * @returns Promise resolving to the body of the successful attempt
   * @throws {FatalFailureError} When an attempt fails in a way that must not be retried
   * @throws {RetriesExhaustedError} When every allowed attempt failed
   * @throws The signal's reason when cancelled
   */
  async execute(operation: RetryableOperation<T>, options: ExecuteOptions<T> = {}): Promise<T> {
    const report = await this.run(operation, options);
    return report.value;
  }

  /**
   * Like {@link execute}, but resolves with the attempt history as well.
   */
  async run(operation: RetryableOperation<T>, options: ExecuteOptions<T> = {}): Promise<RunReport<T>> {
    const { signal, onAttempt } = options;
    const state = options.state ?? new RetryState();
    const attempts: Attempt<T>[] = [];
    const { maxAttempts } = this.policy;

    const record = (
      index: number,
      startedAt: number,
      outcome: Outcome<T>,
      decision: WaitDecision | undefined
    ): void => {
      const attempt: Attempt<T> = Object.freeze({
        index,
        startedAt,
        outcome,
        delay: decision?.delay,
        delaySource: decision?.source,
      });
      attempts.push(attempt);
      this.safeCallOnAttempt(onAttempt, attempt);
    };

    try {
      for (let index = 1; ; index++) {
        throwIfAborted(signal);

        this.logger.debug('Executing operation', {
          operation: operation.id,
          attempt: index,
          maxAttempts,
        });

        const startedAt = this.clock();
        const outcome = await operation.run();

        if (outcome.kind === 'success') {
          record(index, startedAt, outcome, undefined);
          this.logger.debug('Operation succeeded', { operation: operation.id, attempt: index });
          return this.report(outcome.body, attempts, 'succeeded');
        }

        if (outcome.kind === 'fatal' || !this.policy.retryPredicate(outcome)) {
          record(index, startedAt, outcome, undefined);
          this.logger.info('Outcome is not retryable, giving up', {
            operation: operation.id,
            attempt: index,
            reason: outcome.reason,
          });
          throw new FatalFailureError(outcome.reason, attempts, outcome.error);
        }

        if (index >= maxAttempts) {
          record(index, startedAt, outcome, undefined);
          this.logger.warn('All retry attempts exhausted', {
            operation: operation.id,
            attempts: index,
            reason: outcome.reason,
          });
          throw new RetriesExhaustedError(outcome.reason, attempts, outcome.error);
        }

        const decision = nextDelay(this.policy.waitStrategy, index, state.takeAndClear(operation.id));
        record(index, startedAt, outcome, decision);

        this.logger.info('Retrying after delay', {
          operation: operation.id,
          attempt: index,
          nextAttempt: index + 1,
          delayMs: decision.delay,
          delaySource: decision.source,
          strategy: this.policy.waitStrategy.name,
          reason: outcome.reason,
        });

        try {
          await this.sleep(decision.delay, signal);
        } catch (sleepError) {
          // Sleep was cancelled
          if (signal?.aborted) {
            throw abortReason(signal);
          }
          throw sleepError;
        }
      }
    } finally {
      // An override set by the final attempt must not leak into a later run
      state.discard(operation.id);
    }
  }

  /**
   * Get the policy.
   */
  getPolicy(): Readonly<RetryPolicy<T>> {
    return this.policy;
  }

  private report(value: T, attempts: readonly Attempt<T>[], result: RunResult): RunReport<T> {
    return {
      value,
      attempts,
      statistics: summarizeAttempts(attempts, result),
    };
  }

  /**
   * Safely call the onAttempt callback.
   */
  private safeCallOnAttempt(
    callback: ((attempt: Attempt<T>) => void) | undefined,
    attempt: Attempt<T>
  ): void {
    if (!callback) return;

    try {
      callback(attempt);
    } catch (callbackError) {
      this.logger.error('onAttempt callback threw an error', {
        error: callbackError instanceof Error ? callbackError.message : String(callbackError),
      });
    }
  }
}
