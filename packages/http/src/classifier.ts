import {
  type Outcome,
  type RetryableFailure,
  ClientRejectedError,
  RateLimitedError,
  TransientServerError,
  TransportError,
  fatal,
  retryable,
  success,
  toError,
} from '@hookwise/core';
import { type HeaderMap, getHeader } from './types.js';

export const TOO_MANY_REQUESTS = 429;

/** Longest response body quoted in a failure reason */
export const MAX_REASON_BODY_LENGTH = 200;

/** Longest server-directed wait accepted from `Retry-After` (1 hour) */
export const MAX_RETRY_AFTER_MS = 3_600_000;

const INTEGER_SECONDS = /^\d+$/;

/**
 * Parse a `Retry-After` value given in whole seconds.
 *
 * @param value - Raw header value
 * @returns Delay in milliseconds capped at {@link MAX_RETRY_AFTER_MS}, or
 *   undefined when absent or not an integer
 */
export function parseRetryAfter(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const trimmed = value.trim();
  if (!INTEGER_SECONDS.test(trimmed)) {
    return undefined;
  }
  // Overlong digit strings parse to Infinity
  return Math.min(Number.parseInt(trimmed, 10) * 1000, MAX_RETRY_AFTER_MS);
}

/**
 * Human-readable reason for a non-2xx response.
 *
 * @example
 * ```typescript
 * describeResponse(404, 'channel_not_found'); // 'HTTP 404 - channel_not_found'
 * describeResponse(503, ''); // 'HTTP 503'
 * ```
 */
export function describeResponse(statusCode: number, bodyText: string): string {
  const body = bodyText.trim();
  if (body.length === 0) {
    return `HTTP ${String(statusCode)}`;
  }
  const quoted =
    body.length > MAX_REASON_BODY_LENGTH ? `${body.slice(0, MAX_REASON_BODY_LENGTH)}…` : body;
  return `HTTP ${String(statusCode)} - ${quoted}`;
}

/**
 * Classify a raw HTTP response.
 *
 * - 2xx: success carrying the body
 * - 429: retryable, with the `Retry-After` seconds as suggested delay when present
 * - 5xx: retryable
 * - anything else: fatal
 */
export function classifyResponse(
  statusCode: number,
  headers: HeaderMap,
  bodyText = ''
): Outcome<string> {
  if (statusCode >= 200 && statusCode < 300) {
    return success(bodyText);
  }

  const reason = describeResponse(statusCode, bodyText);

  if (statusCode === TOO_MANY_REQUESTS) {
    const suggestedDelay = parseRetryAfter(getHeader(headers, 'retry-after'));
    return retryable(reason, {
      suggestedDelay,
      error: new RateLimitedError(reason, suggestedDelay),
    });
  }

  if (statusCode >= 500 && statusCode < 600) {
    return retryable(reason, { error: new TransientServerError(statusCode, reason) });
  }

  return fatal(reason, new ClientRejectedError(statusCode, reason));
}

/**
 * Classify a transport rejection. Connection-level failures are transient.
 */
export function classifyTransportError(error: unknown): RetryableFailure {
  const transportError =
    error instanceof TransportError ? error : new TransportError(toError(error).message, error);
  return retryable(`Transport error: ${transportError.message}`, { error: transportError });
}
