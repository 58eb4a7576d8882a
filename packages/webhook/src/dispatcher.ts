import {
  type Attempt,
  type Clock,
  type HookwiseLogger,
  type Sleeper,
  RetryTerminationError,
  UnknownTargetError,
  noopLogger,
  toError,
} from '@hookwise/core';
import { type Transport, createFetchTransport } from '@hookwise/http';
import { type RetryStatistics, createRetryPolicy, summarizeTermination } from '@hookwise/retry';
import { type WebhookConfig } from './config.js';
import { type DeliveryReport, WebhookNotifier } from './notifier.js';
import { type WebhookPayload } from './payload.js';

/**
 * Options for constructing a {@link WebhookDispatcher}.
 */
export interface WebhookDispatcherOptions {
  /** Transport shared by all targets (default: fetch with the configured timeout) */
  transport?: Transport;
  /** Logger instance for structured logging */
  logger?: HookwiseLogger;
  sleep?: Sleeper;
  clock?: Clock;
}

/**
 * Per-target result of a broadcast.
 */
export type DeliveryResult =
  | {
      readonly target: string;
      readonly status: 'delivered';
      readonly report: DeliveryReport;
    }
  | {
      readonly target: string;
      readonly status: 'failed';
      readonly error: Error;
      readonly attempts: readonly Attempt[];
      /** Absent when the run was cancelled */
      readonly statistics: RetryStatistics | undefined;
    };

interface Target {
  readonly url: string;
  readonly notifier: WebhookNotifier;
}

/**
 * Delivers payloads to the targets named in a webhook configuration.
 *
 * Every target has its own notifier, so runs against different targets never
 * share retry state.
 *
 * @example
 * ```typescript
 * const dispatcher = new WebhookDispatcher(await loadWebhookConfig('./webhooks.json'));
 * const results = await dispatcher.broadcast({ text: 'Deploy finished' });
 * ```
 */
export class WebhookDispatcher {
  private readonly targets = new Map<string, Target>();
  private readonly logger: HookwiseLogger;

  constructor(config: Readonly<WebhookConfig>, options: WebhookDispatcherOptions = {}) {
    this.logger = options.logger ?? noopLogger;
    const transport =
      options.transport ??
      createFetchTransport({
        logger: this.logger,
        ...(config.timeoutMs === undefined ? {} : { timeoutMs: config.timeoutMs }),
      });
    const policy = createRetryPolicy<string>(config.retry ?? {});

    for (const [name, target] of Object.entries(config.targets)) {
      const { url, ...routing } = target;
      this.targets.set(name, {
        url,
        notifier: new WebhookNotifier({
          name,
          transport,
          routing: { ...config.defaults, ...routing },
          policy,
          logger: this.logger,
          ...(options.sleep === undefined ? {} : { sleep: options.sleep }),
          ...(options.clock === undefined ? {} : { clock: options.clock }),
        }),
      });
    }
  }

  /**
   * Names of the configured targets, in configuration order.
   */
  get targetNames(): string[] {
    return [...this.targets.keys()];
  }

  /**
   * Notifier of a target, for inspecting its last run.
   *
   * @throws {UnknownTargetError} If the target is not configured
   */
  notifier(target: string): WebhookNotifier {
    return this.resolve(target).notifier;
  }

  /**
   * Deliver a payload to one target.
   *
   * @throws {UnknownTargetError} If the target is not configured
   */
  async send(target: string, payload: WebhookPayload, signal?: AbortSignal): Promise<DeliveryReport> {
    const { url, notifier } = this.resolve(target);
    return notifier.notifyDetailed(url, payload, signal);
  }

  /**
   * Deliver a payload to every target concurrently. Resolves once all runs
   * have finished; a failed target is reported, not thrown.
   */
  async broadcast(payload: WebhookPayload, signal?: AbortSignal): Promise<DeliveryResult[]> {
    const results = await Promise.all(
      this.targetNames.map((target) => this.deliver(target, payload, signal))
    );

    this.logger.info('Broadcast finished', {
      targets: results.length,
      delivered: results.filter((result) => result.status === 'delivered').length,
    });

    return results;
  }

  private async deliver(
    target: string,
    payload: WebhookPayload,
    signal: AbortSignal | undefined
  ): Promise<DeliveryResult> {
    try {
      const report = await this.send(target, payload, signal);
      return { target, status: 'delivered', report };
    } catch (error) {
      if (error instanceof RetryTerminationError) {
        return {
          target,
          status: 'failed',
          error,
          attempts: error.attempts,
          statistics: summarizeTermination(error),
        };
      }
      return { target, status: 'failed', error: toError(error), attempts: [], statistics: undefined };
    }
  }

  private resolve(target: string): Target {
    const resolved = this.targets.get(target);
    if (resolved === undefined) {
      throw new UnknownTargetError(target);
    }
    return resolved;
  }
}
