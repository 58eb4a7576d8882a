import {
  type Attempt,
  type Clock,
  type HookwiseLogger,
  type Outcome,
  type Sleeper,
  RetryTerminationError,
  noopLogger,
} from '@hookwise/core';
import {
  type Transport,
  type TransportResponse,
  classifyResponse,
  classifyTransportError,
  createFetchTransport,
} from '@hookwise/http';
import {
  type RetryPolicy,
  type RetryPolicyInput,
  type RetryStatistics,
  RetryExecutor,
  RetryState,
  summarizeTermination,
} from '@hookwise/retry';
import { type RoutingOptions, type WebhookPayload, buildPayload } from './payload.js';

const JSON_HEADERS: Readonly<Record<string, string>> = Object.freeze({
  'Content-Type': 'application/json',
});

/**
 * Options for constructing a {@link WebhookNotifier}.
 */
export interface WebhookNotifierOptions {
  /** Name used in log context */
  name?: string;
  /** HTTP transport (default: fetch with `timeoutMs`) */
  transport?: Transport;
  /** Per-request timeout for the default transport in milliseconds */
  timeoutMs?: number;
  /** Routing metadata added to each payload */
  routing?: RoutingOptions;
  /** Retry policy settings */
  retry?: RetryPolicyInput<string>;
  /** Prebuilt policy; takes precedence over `retry` */
  policy?: RetryPolicy<string>;
  /** Logger instance for structured logging */
  logger?: HookwiseLogger;
  sleep?: Sleeper;
  clock?: Clock;
}

/**
 * Result of a delivered notification.
 */
export interface DeliveryReport {
  readonly endpoint: string;
  /** Response body of the successful attempt */
  readonly body: string;
  readonly attempts: readonly Attempt<string>[];
  readonly statistics: RetryStatistics;
}

/**
 * Posts JSON notifications to webhook endpoints with retries.
 *
 * A 429 answer with `Retry-After` makes the next wait follow the server's
 * hint; other retryable answers wait on the policy's schedule.
 *
 * @example
 * ```typescript
 * const notifier = new WebhookNotifier({ routing: { channel: 'deploys' } });
 * await notifier.notify(url, { text: 'Deploy finished' });
 * console.log(notifier.lastStatistics);
 * ```
 */
export class WebhookNotifier {
  private readonly name: string | undefined;
  private readonly transport: Transport;
  private readonly routing: RoutingOptions;
  private readonly executor: RetryExecutor<string>;
  private readonly logger: HookwiseLogger;
  private readonly state = new RetryState();
  private sequence = 0;
  private attemptsOfLastRun: readonly Attempt[] = [];
  private statisticsOfLastRun: RetryStatistics | undefined;

  constructor(options: WebhookNotifierOptions = {}) {
    this.name = options.name;
    this.logger = options.logger ?? noopLogger;
    this.transport =
      options.transport ??
      createFetchTransport({
        logger: this.logger,
        ...(options.timeoutMs === undefined ? {} : { timeoutMs: options.timeoutMs }),
      });
    this.routing = options.routing ?? {};
    this.executor = new RetryExecutor<string>({
      ...options.retry,
      ...(options.policy === undefined ? {} : { policy: options.policy }),
      logger: this.logger,
      ...(options.sleep === undefined ? {} : { sleep: options.sleep }),
      ...(options.clock === undefined ? {} : { clock: options.clock }),
    });
  }

  /**
   * Deliver a payload.
   *
   * @returns Response body of the successful attempt
   * @throws {FatalFailureError} On a non-retryable answer, such as 404
   * @throws {RetriesExhaustedError} When every attempt failed
   */
  async notify(endpoint: string, payload: WebhookPayload, signal?: AbortSignal): Promise<string> {
    const report = await this.notifyDetailed(endpoint, payload, signal);
    return report.body;
  }

  /**
   * Like {@link notify}, but resolves with the attempt history as well.
   */
  async notifyDetailed(
    endpoint: string,
    payload: WebhookPayload,
    signal?: AbortSignal
  ): Promise<DeliveryReport> {
    this.sequence++;
    const id = `POST ${endpoint} #${String(this.sequence)}`;
    const body = buildPayload(payload, this.routing);

    try {
      const report = await this.executor.run(
        { id, run: () => this.attempt(id, endpoint, body) },
        { state: this.state, ...(signal === undefined ? {} : { signal }) }
      );
      this.remember(report.attempts, report.statistics);
      this.logger.info('Webhook delivered', {
        target: this.name,
        operation: id,
        attempts: report.statistics.attemptCount,
        totalDelayMs: report.statistics.totalDelay,
      });
      return {
        endpoint,
        body: report.value,
        attempts: report.attempts,
        statistics: report.statistics,
      };
    } catch (error) {
      if (error instanceof RetryTerminationError) {
        this.remember(error.attempts, summarizeTermination(error));
        this.logger.error('Webhook delivery failed', {
          target: this.name,
          operation: id,
          error,
        });
      }
      throw error;
    }
  }

  /**
   * Attempts of the most recently finished run.
   */
  get lastAttempts(): readonly Attempt[] {
    return this.attemptsOfLastRun;
  }

  /**
   * Statistics of the most recently finished run.
   */
  get lastStatistics(): RetryStatistics | undefined {
    return this.statisticsOfLastRun;
  }

  private async attempt(
    id: string,
    endpoint: string,
    body: Record<string, unknown>
  ): Promise<Outcome<string>> {
    let response: TransportResponse;
    try {
      response = await this.transport.send(endpoint, body, JSON_HEADERS);
    } catch (error) {
      return classifyTransportError(error);
    }

    const outcome = classifyResponse(response.statusCode, response.headers, response.bodyText);
    if (outcome.kind === 'retryable' && outcome.suggestedDelay !== undefined) {
      this.state.set(id, outcome.suggestedDelay);
    }
    return outcome;
  }

  private remember(attempts: readonly Attempt[], statistics: RetryStatistics): void {
    this.attemptsOfLastRun = attempts;
    this.statisticsOfLastRun = statistics;
  }
}
