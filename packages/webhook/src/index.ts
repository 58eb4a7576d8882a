export {
  type WebhookPayload,
  type RoutingOptions,
  normalizeChannel,
  buildPayload,
} from './payload.js';

export {
  type WebhookConfig,
  type WebhookConfigInput,
  type TargetConfig,
  routingConfigSchema,
  targetConfigSchema,
  webhookConfigSchema,
  parseWebhookConfig,
  loadWebhookConfig,
} from './config.js';

export {
  type WebhookNotifierOptions,
  type DeliveryReport,
  WebhookNotifier,
} from './notifier.js';

export {
  type WebhookDispatcherOptions,
  type DeliveryResult,
  WebhookDispatcher,
} from './dispatcher.js';

export { type DefaultLoggerOptions, createDefaultLogger } from './logger.js';
