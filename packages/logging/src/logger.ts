import { type HookwiseLogger } from '@hookwise/core';

/**
 * Log level enumeration.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Context data to include in log messages.
 */
export type LogContext = Record<string, unknown>;

/**
 * Logger with child logger support.
 *
 * Extends the base HookwiseLogger from @hookwise/core so it can be handed to
 * any component that logs. This is compatible with pino, winston, and other
 * logging libraries that support child loggers.
 */
export interface StructuredLogger extends HookwiseLogger {
  /**
   * Create a child logger with additional context.
   *
   * @param bindings - Context to bind to all log messages
   * @returns Child logger with bound context
   */
  child(bindings: LogContext): StructuredLogger;
}
