/**
 * Response header mapping as returned by a transport.
 * Lookups through {@link getHeader} are case-insensitive.
 */
export type HeaderMap = Readonly<Record<string, string | readonly string[] | undefined>>;

/**
 * Raw result of one HTTP exchange.
 */
export interface TransportResponse {
  /** HTTP status code */
  readonly statusCode: number;
  /** Response headers */
  readonly headers: HeaderMap;
  /** Response body as text */
  readonly bodyText: string;
}

/**
 * Sends one HTTP POST with a JSON body.
 *
 * Resolves with whatever status the server answered; rejects only on
 * connection-level failures, preferably with a `TransportError`.
 */
export interface Transport {
  send(
    url: string,
    jsonBody: unknown,
    headers: Readonly<Record<string, string>>
  ): Promise<TransportResponse>;
}

/**
 * Read a header value regardless of the name's case.
 *
 * @param headers - Header mapping
 * @param name - Header name
 * @returns The first value, or undefined when absent
 */
export function getHeader(headers: HeaderMap, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const key of Object.keys(headers)) {
    if (key.toLowerCase() !== wanted) continue;
    const value = headers[key];
    if (typeof value === 'string') {
      return value;
    }
    return value?.[0];
  }
  return undefined;
}
