import { type Outcome, type RetryableOperation } from '@hookwise/core';

/**
 * Anything that can store a server-directed override, such as a RetryState.
 */
export interface OverrideSink {
  set(id: string, delay: number): void;
}

/**
 * Configuration for a scripted operation.
 */
export interface ScriptedOperationConfig<T> {
  /** Operation id (default: 'scripted') */
  id?: string;
  /** Outcomes to return in sequence */
  outcomes: readonly Outcome<T>[];
  /** Outcome returned after the sequence is exhausted */
  defaultOutcome?: Outcome<T>;
  /** Receives suggested delays of retryable outcomes, the way a real caller would */
  overrides?: OverrideSink;
}

/**
 * Create an operation that returns scripted outcomes.
 *
 * @example
 * ```typescript
 * const { operation, stats } = createScriptedOperation({
 *   outcomes: [retryable('HTTP 503'), success('ok')],
 * });
 *
 * await executor.execute(operation); // 'ok'
 * stats.callCount; // 2
 * ```
 */
export function createScriptedOperation<T>(config: ScriptedOperationConfig<T>): {
  operation: RetryableOperation<T>;
  stats: {
    readonly callCount: number;
    reset: () => void;
  };
} {
  const { id = 'scripted', outcomes, defaultOutcome, overrides } = config;
  let callCount = 0;

  const operation: RetryableOperation<T> = {
    id,
    run(): Promise<Outcome<T>> {
      const outcome = outcomes[callCount] ?? defaultOutcome;
      callCount++;

      if (outcome === undefined) {
        return Promise.reject(
          new Error(`No outcome scripted for call ${String(callCount)}`)
        );
      }
      if (outcome.kind === 'retryable' && outcome.suggestedDelay !== undefined) {
        overrides?.set(id, outcome.suggestedDelay);
      }
      return Promise.resolve(outcome);
    },
  };

  return {
    operation,
    stats: {
      get callCount() {
        return callCount;
      },
      reset() {
        callCount = 0;
      },
    },
  };
}
