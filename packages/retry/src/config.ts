import { z } from 'zod';
import { type Outcome, type RandomSource } from '@hookwise/core';
import {
  type WaitStrategy,
  chainWait,
  exponentialWait,
  fixedWait,
  linearWait,
  withJitter,
} from './backoff.js';

/** Maximum allowed retry attempts to prevent resource exhaustion */
const MAX_RETRY_ATTEMPTS = 100;

/** Maximum allowed delay in milliseconds (1 hour) */
const MAX_DELAY_MS = 3_600_000;

const delaySchema = z.number().int().nonnegative().max(MAX_DELAY_MS);

export const exponentialWaitConfigSchema = z.object({
  type: z.literal('exponential'),
  /** Delay after the first attempt in milliseconds (default: 1000) */
  initialDelay: delaySchema.default(1000),
  /** Growth factor per attempt (default: 2, max: 10) */
  multiplier: z.number().positive().max(10).default(2),
  /** Lower bound in milliseconds (default: 0) */
  minDelay: delaySchema.default(0),
  /** Upper bound in milliseconds (default: 10000) */
  maxDelay: delaySchema.default(10_000),
});

export const linearWaitConfigSchema = z.object({
  type: z.literal('linear'),
  initialDelay: delaySchema.default(1000),
  maxDelay: delaySchema.optional(),
});

export const fixedWaitConfigSchema = z.object({
  type: z.literal('fixed'),
  delay: delaySchema.default(1000),
});

export const chainWaitConfigSchema = z.object({
  type: z.literal('chain'),
  /** Delay per attempt; the last entry repeats */
  delays: z.array(delaySchema).min(1),
});

/**
 * Zod schema for the default wait schedule.
 */
export const waitStrategyConfigSchema = z.discriminatedUnion('type', [
  exponentialWaitConfigSchema,
  linearWaitConfigSchema,
  fixedWaitConfigSchema,
  chainWaitConfigSchema,
]);

export type WaitStrategyConfigInput = z.input<typeof waitStrategyConfigSchema>;
export type WaitStrategyConfig = z.output<typeof waitStrategyConfigSchema>;

export const jitterSchema = z.enum(['none', 'full', 'equal']);
export type Jitter = z.infer<typeof jitterSchema>;

export const DEFAULT_WAIT: WaitStrategyConfig = {
  type: 'exponential',
  initialDelay: 1000,
  multiplier: 2,
  minDelay: 0,
  maxDelay: 10_000,
};

/**
 * Zod schema for retry policy configuration.
 */
export const retryPolicyConfigSchema = z
  .object({
    /** Maximum number of attempts including the first (default: 4, max: 100) */
    maxAttempts: z.number().int().positive().max(MAX_RETRY_ATTEMPTS).default(4),
    /** Default wait schedule (default: exponential 1s doubling up to 10s) */
    wait: waitStrategyConfigSchema.default(DEFAULT_WAIT),
    /** Jitter applied to the default schedule (default: 'none') */
    jitter: jitterSchema.default('none'),
  })
  .refine((config) => config.wait.type !== 'exponential' || config.wait.minDelay <= config.wait.maxDelay, {
    message: 'minDelay must not exceed maxDelay',
    path: ['wait'],
  });

/**
 * Raw config input type (before defaults are applied).
 */
export type RetryPolicyConfigInput = z.input<typeof retryPolicyConfigSchema>;

/**
 * Parsed config type (after defaults are applied).
 */
export type RetryPolicyConfig = z.output<typeof retryPolicyConfigSchema>;

/**
 * Governs one kind of retried call: attempt budget, wait schedule and
 * which outcomes are worth another attempt.
 *
 * @template T - The success body type
 */
export interface RetryPolicy<T = unknown> {
  readonly maxAttempts: number;
  readonly waitStrategy: WaitStrategy;
  readonly retryPredicate: (outcome: Outcome<T>) => boolean;
}

/**
 * Input for {@link createRetryPolicy}: validated config plus code-only hooks.
 */
export interface RetryPolicyInput<T = unknown> extends RetryPolicyConfigInput {
  /** Replaces the schedule built from `wait` */
  waitStrategy?: WaitStrategy;
  /** Decides whether a retryable outcome gets another attempt */
  retryPredicate?: (outcome: Outcome<T>) => boolean;
  /** Random source for jitter (default: Math.random) */
  random?: RandomSource;
}

/**
 * Only outcomes classified as retryable are retried.
 */
export function defaultRetryPredicate<T>(outcome: Outcome<T>): boolean {
  return outcome.kind === 'retryable';
}

/**
 * Build a wait strategy from validated configuration.
 */
export function createWaitStrategy(config: WaitStrategyConfig): WaitStrategy {
  switch (config.type) {
    case 'exponential':
      return exponentialWait(config);
    case 'linear':
      return linearWait(config);
    case 'fixed':
      return fixedWait(config.delay);
    case 'chain':
      return chainWait(config.delays);
    default: {
      const _exhaustive: never = config;
      return _exhaustive;
    }
  }
}

/**
 * Parse and validate retry configuration.
 *
 * @param config - Raw configuration input
 * @returns Validated configuration with defaults applied
 */
export function parseRetryPolicyConfig(config?: RetryPolicyConfigInput): RetryPolicyConfig {
  return retryPolicyConfigSchema.parse(config ?? {});
}

/**
 * Build an immutable retry policy.
 *
 * @example
 * ```typescript
 * const policy = createRetryPolicy({
 *   maxAttempts: 4,
 *   wait: { type: 'chain', delays: [1000, 1000, 3000, 3000, 6000] },
 * });
 * ```
 */
export function createRetryPolicy<T = unknown>(input: RetryPolicyInput<T> = {}): RetryPolicy<T> {
  const { waitStrategy, retryPredicate, random, ...config } = input;
  const parsed = parseRetryPolicyConfig(config);

  let strategy = waitStrategy ?? createWaitStrategy(parsed.wait);
  if (parsed.jitter !== 'none') {
    strategy = withJitter(strategy, parsed.jitter, random ?? Math.random);
  }

  return Object.freeze({
    maxAttempts: parsed.maxAttempts,
    waitStrategy: strategy,
    retryPredicate: retryPredicate ?? defaultRetryPredicate,
  });
}
