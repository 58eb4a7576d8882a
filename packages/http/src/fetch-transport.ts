import { type HookwiseLogger, TransportError, noopLogger, toError } from '@hookwise/core';
import { type Transport, type TransportResponse } from './types.js';

/**
 * Configuration for {@link createFetchTransport}.
 */
export interface FetchTransportConfig {
  /** Per-request timeout in milliseconds (default: 10000) */
  timeoutMs?: number;
  /** Fetch implementation (default: the global fetch) */
  fetch?: typeof fetch;
  /** Logger instance for structured logging */
  logger?: HookwiseLogger;
}

/**
 * Create a transport that POSTs JSON with the platform fetch.
 *
 * Each request is bounded by its own timeout. Cancellation of a retry run
 * never aborts a request in flight; only this timeout does.
 *
 * @example
 * ```typescript
 * const transport = createFetchTransport({ timeoutMs: 5000 });
 * const response = await transport.send(url, { text: 'deploy finished' }, {
 *   'Content-Type': 'application/json',
 * });
 * ```
 */
export function createFetchTransport(config: FetchTransportConfig = {}): Transport {
  const timeoutMs = config.timeoutMs ?? 10_000;
  const fetchImpl = config.fetch ?? globalThis.fetch;
  const logger = config.logger ?? noopLogger;

  return {
    async send(url, jsonBody, headers): Promise<TransportResponse> {
      const failed = (error: unknown): TransportError => {
        const cause = toError(error);
        logger.debug('Request failed at the transport level', { error: cause.message });
        return new TransportError(
          cause.name === 'TimeoutError'
            ? `Request timed out after ${String(timeoutMs)}ms`
            : cause.message,
          cause
        );
      };

      let response: Response;
      let bodyText: string;
      try {
        response = await fetchImpl(url, {
          method: 'POST',
          headers: { ...headers },
          body: JSON.stringify(jsonBody),
          signal: AbortSignal.timeout(timeoutMs),
        });
        bodyText = await response.text();
      } catch (error) {
        throw failed(error);
      }

      const responseHeaders: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        responseHeaders[key] = value;
      });

      return {
        statusCode: response.status,
        headers: responseHeaders,
        bodyText,
      };
    },
  };
}
