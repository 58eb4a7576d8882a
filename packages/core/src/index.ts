// Errors
export {
  HookwiseError,
  TransientServerError,
  RateLimitedError,
  ClientRejectedError,
  TransportError,
  RetryTerminationError,
  RetriesExhaustedError,
  FatalFailureError,
  ConfigError,
  UnknownTargetError,
  isRetryable,
  isRetryableError,
  type RetryableError,
} from './errors.js';

// Outcomes
export {
  type Outcome,
  type OutcomeKind,
  type SuccessOutcome,
  type RetryableFailure,
  type FatalFailure,
  type Attempt,
  type DelaySource,
  success,
  retryable,
  fatal,
  isSuccess,
  isRetryableFailure,
  isFatalFailure,
} from './outcome.js';

// Types
export {
  type RetryableOperation,
  type Sleeper,
  type Clock,
  type RandomSource,
  type HookwiseLogger,
  noopLogger,
} from './types.js';

// Utilities
export {
  sleep,
  abortReason,
  throwIfAborted,
  isAbortError,
  toError,
  addJitter,
  clamp,
  type JitterMode,
} from './utils.js';
