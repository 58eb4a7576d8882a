/**
 * JSON message body sent to a webhook.
 */
export type WebhookPayload = Readonly<Record<string, unknown>>;

/**
 * Routing metadata merged into every payload a notifier sends.
 */
export interface RoutingOptions {
  /** Destination channel; overrides any channel set in the payload */
  channel?: string;
  /** Sender name, used only when the payload sets none */
  username?: string;
  /** Sender icon, used only when the payload sets none */
  iconEmoji?: string;
}

/**
 * Prefix a bare channel name with `#`. Names that already start with `#` or
 * `@` (a direct message) are kept.
 *
 * @example
 * ```typescript
 * normalizeChannel('alerts'); // '#alerts'
 * normalizeChannel('@oncall'); // '@oncall'
 * ```
 */
export function normalizeChannel(channel: string): string {
  const trimmed = channel.trim();
  if (trimmed.startsWith('#') || trimmed.startsWith('@')) {
    return trimmed;
  }
  return `#${trimmed}`;
}

/**
 * Build the body of one request. The caller's payload is not modified.
 */
export function buildPayload(
  payload: WebhookPayload,
  routing: RoutingOptions = {}
): Record<string, unknown> {
  const body: Record<string, unknown> = { ...payload };

  if (routing.channel !== undefined && routing.channel.trim().length > 0) {
    body.channel = normalizeChannel(routing.channel);
  }
  if (routing.username !== undefined && body.username === undefined) {
    body.username = routing.username;
  }
  if (routing.iconEmoji !== undefined && body.icon_emoji === undefined) {
    body.icon_emoji = routing.iconEmoji;
  }

  return body;
}
