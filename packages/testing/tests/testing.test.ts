import { describe, it, expect } from 'vitest';
import { TransportError, retryable, success } from '@hookwise/core';
import {
  createScriptedOperation,
  createScriptedTransport,
  createVirtualTime,
} from '../src/index.js';

describe('createScriptedOperation', () => {
  it('should return outcomes in order then the default', async () => {
    const { operation, stats } = createScriptedOperation({
      id: 'op',
      outcomes: [retryable('HTTP 503')],
      defaultOutcome: success('ok'),
    });

    expect((await operation.run()).kind).toBe('retryable');
    expect(await operation.run()).toEqual({ kind: 'success', body: 'ok' });
    expect(await operation.run()).toEqual({ kind: 'success', body: 'ok' });
    expect(stats.callCount).toBe(3);
    expect(operation.id).toBe('op');
  });

  it('should reject when the script runs out', async () => {
    const { operation } = createScriptedOperation<string>({ outcomes: [] });
    await expect(operation.run()).rejects.toThrow('No outcome scripted for call 1');
  });

  it('should forward suggested delays to the override sink', async () => {
    const stored: Array<[string, number]> = [];
    const { operation } = createScriptedOperation({
      id: 'hook',
      outcomes: [retryable('HTTP 429', { suggestedDelay: 3000 })],
      overrides: { set: (id, delay) => stored.push([id, delay]) },
    });

    await operation.run();
    expect(stored).toEqual([['hook', 3000]]);
  });

  it('should reset the call count', async () => {
    const { operation, stats } = createScriptedOperation({ outcomes: [], defaultOutcome: success(1) });
    await operation.run();
    stats.reset();
    expect(stats.callCount).toBe(0);
  });
});

describe('createVirtualTime', () => {
  it('should advance the clock by each sleep', async () => {
    const time = createVirtualTime(1000);

    await time.sleep(250);
    await time.sleep(750);

    expect(time.clock()).toBe(2000);
    expect(time.delays).toEqual([250, 750]);
  });

  it('should reject sleeps on an aborted signal without advancing', async () => {
    const time = createVirtualTime();
    const controller = new AbortController();
    controller.abort();

    await expect(time.sleep(100, controller.signal)).rejects.toThrow();
    expect(time.now()).toBe(0);
    expect(time.delays).toEqual([]);
  });

  it('should advance manually', () => {
    const time = createVirtualTime();
    time.advance(42);
    expect(time.now()).toBe(42);
  });
});

describe('createScriptedTransport', () => {
  it('should answer from the script and record requests', async () => {
    const { transport, requests } = createScriptedTransport([
      { statusCode: 429, headers: { 'Retry-After': '2' } },
      { statusCode: 200, bodyText: 'ok' },
    ]);

    const first = await transport.send('https://hooks.example.test/a', { text: 'hi' }, { 'Content-Type': 'application/json' });
    const second = await transport.send('https://hooks.example.test/a', { text: 'hi' }, {});

    expect(first).toEqual({ statusCode: 429, headers: { 'Retry-After': '2' }, bodyText: '' });
    expect(second.bodyText).toBe('ok');
    expect(requests).toHaveLength(2);
    expect(requests[0]).toEqual({
      url: 'https://hooks.example.test/a',
      body: { text: 'hi' },
      headers: { 'Content-Type': 'application/json' },
    });
  });

  it('should reject with scripted errors', async () => {
    const error = new TransportError('connection reset');
    const { transport } = createScriptedTransport([error]);
    await expect(transport.send('u', {}, {})).rejects.toBe(error);
  });

  it('should fall back once the script is exhausted', async () => {
    const { transport } = createScriptedTransport([], { statusCode: 503 });
    expect((await transport.send('u', {}, {})).statusCode).toBe(503);
  });

  it('should reject when nothing is scripted', async () => {
    const { transport } = createScriptedTransport([]);
    await expect(transport.send('u', {}, {})).rejects.toThrow('No reply scripted for request 1');
  });
});
