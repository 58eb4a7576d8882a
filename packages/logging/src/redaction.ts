import { z } from 'zod';
import { type LogContext, type StructuredLogger } from './logger.js';
import { serializeError } from './serializers.js';

/**
 * Keys whose values are always masked, matched case-insensitively.
 */
export const DEFAULT_SENSITIVE_KEYS: readonly string[] = [
  'authorization',
  'password',
  'secret',
  'token',
  'apiKey',
  'webhookSecret',
];

/**
 * Zod schema for URL redaction options.
 */
export const urlRedactionConfigSchema = z.object({
  /** Keys whose values are replaced entirely (default: DEFAULT_SENSITIVE_KEYS) */
  keys: z.array(z.string()).readonly().default(DEFAULT_SENSITIVE_KEYS),
  /** Replacement for masked values and URL path tails (default: '[REDACTED]') */
  replacement: z.string().min(1).default('[REDACTED]'),
  /** Maximum depth for nested objects (default: 10) */
  maxDepth: z.number().int().positive().max(20).default(10),
});

export type UrlRedactionConfig = z.input<typeof urlRedactionConfigSchema>;
export type ParsedUrlRedactionConfig = z.output<typeof urlRedactionConfigSchema>;

const UNSAFE_KEYS = new Set(['__proto__', 'constructor', 'prototype']);

const CIRCULAR_MARKER = '[Circular]';
const MAX_DEPTH_MARKER = '[Max Depth Exceeded]';

/** http(s) URLs embedded anywhere in a string */
const EMBEDDED_URL = /https?:\/\/[^\s"'<>]+/g;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === null || proto === Object.prototype;
}

/**
 * Mask everything of a URL after its first path segment.
 *
 * Incoming-webhook URLs carry their credential in the path, so only the
 * origin and the first segment stay readable. Credentials in the userinfo
 * part are dropped. Strings that do not parse as URLs are returned as is.
 *
 * @example
 * ```typescript
 * redactUrl('https://hooks.example.com/services/T000/B000/test-secret');
 * // 'https://hooks.example.com/services/[REDACTED]'
 * ```
 */
export function redactUrl(value: string, replacement = '[REDACTED]'): string {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    return value;
  }

  const [first, ...rest] = url.pathname.split('/').filter((segment) => segment.length > 0);
  let result = url.origin;
  if (first !== undefined) {
    result += `/${first}`;
  }
  if (rest.length > 0 || url.search.length > 0 || url.hash.length > 0) {
    result += `/${replacement}`;
  }
  return result;
}

/**
 * Mask every http(s) URL embedded in a string.
 */
export function redactUrlsInText(text: string, replacement = '[REDACTED]'): string {
  return text.replace(EMBEDDED_URL, (match) => redactUrl(match, replacement));
}

/**
 * Redact a log context: values under sensitive keys are replaced and URLs in
 * string values are masked, recursing into plain objects and arrays.
 *
 * @param context - The log context to redact
 * @param config - Redaction options
 * @returns New object with sensitive values redacted
 */
export function redactContext(context: LogContext, config: UrlRedactionConfig = {}): LogContext {
  const { keys, replacement, maxDepth } = urlRedactionConfigSchema.parse(config);
  const keySet = new Set(keys.map((key) => key.toLowerCase()));
  const visited = new WeakSet<object>();

  function redactValue(value: unknown, depth: number): unknown {
    if (typeof value === 'string') {
      return redactUrlsInText(value, replacement);
    }
    if (value === null || typeof value !== 'object') {
      return value;
    }
    if (value instanceof Error) {
      // Error messages may quote the endpoint
      return redactValue(serializeError(value), depth);
    }
    if (depth >= maxDepth) {
      return MAX_DEPTH_MARKER;
    }
    if (visited.has(value)) {
      return CIRCULAR_MARKER;
    }
    if (Array.isArray(value)) {
      visited.add(value);
      return value.map((item: unknown) => redactValue(item, depth + 1));
    }
    if (isPlainObject(value)) {
      return redactObject(value, depth + 1);
    }
    // Dates and class instances are left to the logger
    return value;
  }

  function redactObject(obj: Record<string, unknown>, depth: number): Record<string, unknown> {
    visited.add(obj);
    const result: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(obj)) {
      if (UNSAFE_KEYS.has(key)) {
        continue;
      }
      result[key] = keySet.has(key.toLowerCase()) ? replacement : redactValue(value, depth);
    }

    return result;
  }

  return redactObject(context, 0);
}

/**
 * Wrap a logger so messages, context and child bindings never reveal a full
 * webhook URL or a sensitive key's value.
 *
 * @example
 * ```typescript
 * const logger = withUrlRedaction(createPinoLogger(pino()));
 * logger.info('Delivering', { url: 'https://hooks.example.com/services/T000/B000/test-secret' });
 * // url: 'https://hooks.example.com/services/[REDACTED]'
 * ```
 */
export function withUrlRedaction(
  logger: StructuredLogger,
  config: UrlRedactionConfig = {}
): StructuredLogger {
  const parsed = urlRedactionConfigSchema.parse(config);
  const redactMessage = (msg: string): string => redactUrlsInText(msg, parsed.replacement);

  const boundDebug = logger.debug.bind(logger);
  const boundInfo = logger.info.bind(logger);
  const boundWarn = logger.warn.bind(logger);
  const boundError = logger.error.bind(logger);
  const boundChild = logger.child.bind(logger);

  const wrapMethod =
    (method: (msg: string, context?: LogContext) => void) =>
    (msg: string, context?: LogContext): void => {
      if (context) {
        method(redactMessage(msg), redactContext(context, parsed));
      } else {
        method(redactMessage(msg));
      }
    };

  return {
    debug: wrapMethod(boundDebug),
    info: wrapMethod(boundInfo),
    warn: wrapMethod(boundWarn),
    error: wrapMethod(boundError),
    child(bindings: LogContext): StructuredLogger {
      return withUrlRedaction(boundChild(redactContext(bindings, parsed)), parsed);
    },
  };
}
