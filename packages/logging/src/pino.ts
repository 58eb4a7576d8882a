import { type LogContext, type LogLevel, type StructuredLogger } from './logger.js';
import { serializeContext } from './serializers.js';

/**
 * One pino level method.
 */
export interface PinoLogFn {
  (obj: object, msg?: string): void;
  (msg: string): void;
}

/**
 * The part of a pino logger the adapter calls, so tests can pass a stand-in.
 */
export interface PinoLike extends Record<LogLevel, PinoLogFn> {
  child(bindings: object): PinoLike;
}

/**
 * Adapt a pino logger.
 *
 * Context goes in pino's merge object; errors in it are flattened with
 * {@link serializeContext}, so a failed delivery logs its reason and attempt
 * count rather than a bare stack.
 *
 * @example
 * ```typescript
 * import { pino } from 'pino';
 *
 * const logger = createPinoLogger(pino()).child({ target: 'alerts' });
 * logger.error('Webhook delivery failed', { error });
 * ```
 */
export function createPinoLogger(pinoInstance: PinoLike): StructuredLogger {
  const emit =
    (level: LogLevel) =>
    (msg: string, context?: LogContext): void => {
      if (context && Object.keys(context).length > 0) {
        pinoInstance[level](serializeContext(context), msg);
      } else {
        pinoInstance[level](msg);
      }
    };

  return {
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
    child: (bindings) => createPinoLogger(pinoInstance.child(serializeContext(bindings))),
  };
}
