import { RetryTerminationError } from '@hookwise/core';
import { type LogContext } from './logger.js';

/**
 * Log-friendly form of an error.
 */
export interface SerializedError {
  type: string;
  message: string;
  statusCode?: number;
  reason?: string;
  attempts?: number;
  cause?: SerializedError;
}

/**
 * Flatten an error into plain fields. Terminal retry errors keep their
 * reason and attempt count; classified causes keep their status code.
 */
export function serializeError(error: Error): SerializedError {
  const serialized: SerializedError = { type: error.name, message: error.message };

  if ('statusCode' in error && typeof error.statusCode === 'number') {
    serialized.statusCode = error.statusCode;
  }
  if (error instanceof RetryTerminationError) {
    serialized.reason = error.reason;
    serialized.attempts = error.attemptCount;
  }
  if (error.cause instanceof Error && error.cause !== error) {
    serialized.cause = serializeError(error.cause);
  }

  return serialized;
}

/**
 * Replace top-level Error values of a context with their serialized form.
 */
export function serializeContext(context: LogContext): LogContext {
  const result: LogContext = {};
  for (const [key, value] of Object.entries(context)) {
    result[key] = value instanceof Error ? serializeError(value) : value;
  }
  return result;
}
