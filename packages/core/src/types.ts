import { type Outcome } from './outcome.js';

/**
 * An operation run once per attempt by the retry executor.
 *
 * The operation classifies its own result instead of throwing, so the
 * executor decides on retries by inspecting the outcome tag.
 *
 * @template T - The success body type
 */
export interface RetryableOperation<T> {
  /** Identity under which server-directed delays are stored in a RetryState */
  readonly id: string;
  run(): Promise<Outcome<T>>;
}

/**
 * Suspends for a delay; rejects when the signal aborts.
 */
export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Returns the current time in milliseconds.
 */
export type Clock = () => number;

/**
 * Returns a number in [0, 1), like Math.random.
 */
export type RandomSource = () => number;

/**
 * Logger interface for structured logging across all packages.
 * Compatible with pino, winston, console, and custom implementations.
 */
export interface HookwiseLogger {
  debug(msg: string, context?: Record<string, unknown>): void;
  info(msg: string, context?: Record<string, unknown>): void;
  warn(msg: string, context?: Record<string, unknown>): void;
  error(msg: string, context?: Record<string, unknown>): void;
}

/**
 * No-operation logger that discards all log messages.
 */
export const noopLogger: HookwiseLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
