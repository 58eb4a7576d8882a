import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigError, toError } from '@hookwise/core';
import { retryPolicyConfigSchema } from '@hookwise/retry';

/** Upper bound for a per-request timeout (5 minutes) */
const MAX_TIMEOUT_MS = 300_000;

const webhookUrlSchema = z
  .url()
  .refine((value) => /^https?:\/\//i.test(value), { message: 'Webhook URL must use http or https' });

/**
 * Zod schema for routing metadata, shared by targets and defaults.
 */
export const routingConfigSchema = z.object({
  channel: z.string().trim().min(1).optional(),
  username: z.string().min(1).optional(),
  iconEmoji: z.string().min(1).optional(),
});

/**
 * A target is either a bare URL or a URL with its own routing.
 */
export const targetConfigSchema = z
  .union([webhookUrlSchema, routingConfigSchema.extend({ url: webhookUrlSchema })])
  .transform((target) => (typeof target === 'string' ? { url: target } : target));

/**
 * Zod schema for the webhook configuration file.
 */
export const webhookConfigSchema = z.object({
  /** Target name to endpoint */
  targets: z
    .record(z.string().min(1), targetConfigSchema)
    .refine((targets) => Object.keys(targets).length > 0, {
      message: 'At least one target is required',
    }),
  /** Routing applied to targets that do not set their own */
  defaults: routingConfigSchema.optional(),
  /** Retry policy shared by every target */
  retry: retryPolicyConfigSchema.optional(),
  /** Per-request timeout in milliseconds (default: 10000) */
  timeoutMs: z.number().int().positive().max(MAX_TIMEOUT_MS).optional(),
});

export type WebhookConfigInput = z.input<typeof webhookConfigSchema>;
export type WebhookConfig = z.output<typeof webhookConfigSchema>;
export type TargetConfig = z.output<typeof targetConfigSchema>;

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Validate raw configuration.
 *
 * @returns Deeply frozen configuration with defaults applied
 * @throws {ConfigError} If the configuration does not validate
 */
export function parseWebhookConfig(raw: unknown): Readonly<WebhookConfig> {
  const result = webhookConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      `Invalid webhook configuration:\n${z.prettifyError(result.error)}`,
      result.error
    );
  }
  return deepFreeze(result.data);
}

/**
 * Read and validate a JSON configuration file.
 *
 * @example
 * ```typescript
 * const config = await loadWebhookConfig('./webhooks.json');
 * const dispatcher = new WebhookDispatcher(config);
 * ```
 *
 * @throws {ConfigError} If the file cannot be read, is not JSON or does not validate
 */
export async function loadWebhookConfig(path: string): Promise<Readonly<WebhookConfig>> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigError(
      `Cannot read webhook configuration from ${path}: ${toError(error).message}`,
      error
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Webhook configuration in ${path} is not valid JSON`, error);
  }

  return parseWebhookConfig(raw);
}
