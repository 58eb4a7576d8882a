import { type DestinationStream, pino } from 'pino';
import { type LogLevel, type StructuredLogger, createPinoLogger, withUrlRedaction } from '@hookwise/logging';

/**
 * Options for {@link createDefaultLogger}.
 */
export interface DefaultLoggerOptions {
  /** Minimum level to emit (default: 'info') */
  level?: LogLevel;
  /** Where log lines go (default: stdout) */
  destination?: DestinationStream;
}

/**
 * A pino logger whose output never contains a full webhook URL.
 *
 * @example
 * ```typescript
 * const notifier = new WebhookNotifier({ logger: createDefaultLogger({ level: 'debug' }) });
 * ```
 */
export function createDefaultLogger(options: DefaultLoggerOptions = {}): StructuredLogger {
  const pinoOptions = { level: options.level ?? 'info' };
  const instance =
    options.destination === undefined ? pino(pinoOptions) : pino(pinoOptions, options.destination);
  return withUrlRedaction(createPinoLogger(instance));
}
