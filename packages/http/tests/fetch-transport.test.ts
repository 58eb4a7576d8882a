import { describe, it, expect, vi } from 'vitest';
import { TransportError } from '@hookwise/core';
import { createFetchTransport } from '../src/fetch-transport.js';

describe('createFetchTransport', () => {
  it('should POST the JSON body with the given headers', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(
      new Response('ok', { status: 200, headers: { 'X-Request-Id': 'req-1' } })
    );
    const transport = createFetchTransport({ fetch: fetchMock });

    const response = await transport.send(
      'https://hooks.example.test/services/test',
      { text: 'hello' },
      { 'Content-Type': 'application/json' }
    );

    expect(response).toEqual({
      statusCode: 200,
      headers: { 'content-type': 'text/plain;charset=UTF-8', 'x-request-id': 'req-1' },
      bodyText: 'ok',
    });

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('https://hooks.example.test/services/test');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('{"text":"hello"}');
    expect(init?.headers).toEqual({ 'Content-Type': 'application/json' });
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it('should resolve non-2xx responses instead of rejecting', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(
      new Response('rate_limited', { status: 429, headers: { 'Retry-After': '3' } })
    );
    const transport = createFetchTransport({ fetch: fetchMock });

    const response = await transport.send('https://hooks.example.test/a', {}, {});

    expect(response.statusCode).toBe(429);
    expect(response.headers['retry-after']).toBe('3');
    expect(response.bodyText).toBe('rate_limited');
  });

  it('should reject network failures with TransportError', async () => {
    const cause = new TypeError('fetch failed');
    const fetchMock = vi.fn<typeof fetch>().mockRejectedValue(cause);
    const transport = createFetchTransport({ fetch: fetchMock });

    const promise = transport.send('https://hooks.example.test/a', {}, {});

    await expect(promise).rejects.toBeInstanceOf(TransportError);
    await expect(promise).rejects.toMatchObject({ message: 'fetch failed', cause });
  });

  it('should describe timeouts', async () => {
    const timeout = new DOMException('The operation was aborted due to timeout', 'TimeoutError');
    const fetchMock = vi.fn<typeof fetch>().mockRejectedValue(timeout);
    const transport = createFetchTransport({ fetch: fetchMock, timeoutMs: 250 });

    await expect(transport.send('https://hooks.example.test/a', {}, {})).rejects.toThrow(
      'Request timed out after 250ms'
    );
  });
});
