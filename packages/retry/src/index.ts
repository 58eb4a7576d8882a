export {
  RetryExecutor,
  type RetryExecutorOptions,
  type ExecuteOptions,
  type RunReport,
} from './retry.js';
export {
  retryPolicyConfigSchema,
  waitStrategyConfigSchema,
  exponentialWaitConfigSchema,
  linearWaitConfigSchema,
  fixedWaitConfigSchema,
  chainWaitConfigSchema,
  jitterSchema,
  DEFAULT_WAIT,
  type Jitter,
  type WaitStrategyConfig,
  type WaitStrategyConfigInput,
  type RetryPolicy,
  type RetryPolicyInput,
  type RetryPolicyConfig,
  type RetryPolicyConfigInput,
  createRetryPolicy,
  createWaitStrategy,
  defaultRetryPredicate,
  parseRetryPolicyConfig,
} from './config.js';
export {
  type WaitStrategy,
  type WaitDecision,
  nextDelay,
  exponentialWait,
  linearWait,
  fixedWait,
  chainWait,
  withJitter,
  ABSOLUTE_MAX_DELAY_MS,
} from './backoff.js';
export { RetryState } from './state.js';
export {
  type RetryStatistics,
  type RunResult,
  summarizeAttempts,
  summarizeTermination,
} from './statistics.js';
