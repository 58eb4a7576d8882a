import { describe, it, expect } from 'vitest';
import {
  ClientRejectedError,
  FatalFailureError,
  RetriesExhaustedError,
  UnknownTargetError,
} from '@hookwise/core';
import { type Transport } from '@hookwise/http';
import { type ScriptedReply, createScriptedTransport, createVirtualTime } from '@hookwise/testing';
import { parseWebhookConfig } from '../src/config.js';
import { WebhookDispatcher } from '../src/dispatcher.js';

const ALERTS_URL = 'https://hooks.example.com/services/T000/B000/test-secret';
const DEPLOYS_URL = 'https://hooks.example.com/services/T000/B001/test-secret';

function routedTransport(routes: Record<string, readonly ScriptedReply[]>) {
  const scripted = new Map(
    Object.entries(routes).map(([url, replies]) => [url, createScriptedTransport(replies)])
  );
  const transport: Transport = {
    send(url, body, headers) {
      const route = scripted.get(url);
      if (route === undefined) {
        return Promise.reject(new Error(`No route for ${url}`));
      }
      return route.transport.send(url, body, headers);
    },
  };
  const requestsTo = (url: string) => scripted.get(url)?.requests ?? [];
  return { transport, requestsTo };
}

const config = parseWebhookConfig({
  targets: {
    alerts: ALERTS_URL,
    deploys: { url: DEPLOYS_URL, channel: 'deploys', username: 'deploy-bot' },
  },
  defaults: { channel: 'general', username: 'hookwise' },
  retry: { maxAttempts: 2, wait: { type: 'fixed', delay: 50 } },
});

describe('WebhookDispatcher', () => {
  it('should list targets in configuration order', () => {
    const dispatcher = new WebhookDispatcher(config, { transport: routedTransport({}).transport });
    expect(dispatcher.targetNames).toEqual(['alerts', 'deploys']);
  });

  it('should apply defaults and per-target routing', async () => {
    const { transport, requestsTo } = routedTransport({
      [ALERTS_URL]: [{ statusCode: 200, bodyText: 'ok' }],
      [DEPLOYS_URL]: [{ statusCode: 200, bodyText: 'ok' }],
    });
    const dispatcher = new WebhookDispatcher(config, { transport });

    await dispatcher.send('alerts', { text: 'disk full' });
    await dispatcher.send('deploys', { text: 'v2 live' });

    expect(requestsTo(ALERTS_URL)[0]?.body).toEqual({
      text: 'disk full',
      channel: '#general',
      username: 'hookwise',
    });
    expect(requestsTo(DEPLOYS_URL)[0]?.body).toEqual({
      text: 'v2 live',
      channel: '#deploys',
      username: 'deploy-bot',
    });
  });

  it('should use the configured retry policy', async () => {
    const time = createVirtualTime();
    const { transport } = routedTransport({ [ALERTS_URL]: [{ statusCode: 500 }, { statusCode: 500 }] });
    const dispatcher = new WebhookDispatcher(config, { transport, sleep: time.sleep });

    await expect(dispatcher.send('alerts', { text: 'hi' })).rejects.toBeInstanceOf(RetriesExhaustedError);
    expect(time.delays).toEqual([50]);
    expect(dispatcher.notifier('alerts').lastStatistics?.attemptCount).toBe(2);
  });

  it('should reject unknown targets', async () => {
    const dispatcher = new WebhookDispatcher(config, { transport: routedTransport({}).transport });

    await expect(dispatcher.send('billing', { text: 'hi' })).rejects.toBeInstanceOf(UnknownTargetError);
    expect(() => dispatcher.notifier('billing')).toThrow('Unknown webhook target: billing');
  });

  it('should report each target of a broadcast', async () => {
    const time = createVirtualTime();
    const { transport } = routedTransport({
      [ALERTS_URL]: [{ statusCode: 429, headers: { 'Retry-After': '1' } }, { statusCode: 200, bodyText: 'ok' }],
      [DEPLOYS_URL]: [{ statusCode: 404, bodyText: 'channel_not_found' }],
    });
    const dispatcher = new WebhookDispatcher(config, { transport, sleep: time.sleep });

    const [alerts, deploys] = await dispatcher.broadcast({ text: 'maintenance at 22:00' });

    expect(alerts?.status).toBe('delivered');
    if (alerts?.status === 'delivered') {
      expect(alerts.report.body).toBe('ok');
      expect(alerts.report.statistics.serverDirectedDelays).toBe(1);
    }

    expect(deploys?.status).toBe('failed');
    if (deploys?.status === 'failed') {
      expect(deploys.target).toBe('deploys');
      expect(deploys.error).toBeInstanceOf(FatalFailureError);
      expect(deploys.error.cause).toBeInstanceOf(ClientRejectedError);
      expect(deploys.attempts).toHaveLength(1);
      expect(deploys.statistics?.result).toBe('fatal');
    }

    expect(time.delays).toEqual([1000]);
  });

  it('should report a cancelled broadcast without statistics', async () => {
    const { transport } = routedTransport({});
    const dispatcher = new WebhookDispatcher(config, { transport });
    const controller = new AbortController();
    controller.abort(new Error('shutting down'));

    const results = await dispatcher.broadcast({ text: 'hi' }, controller.signal);

    expect(results.map((r) => r.status)).toEqual(['failed', 'failed']);
    expect(results[0]).toMatchObject({ attempts: [], statistics: undefined });
  });
});
