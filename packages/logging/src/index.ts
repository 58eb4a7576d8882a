export { type LogLevel, type LogContext, type StructuredLogger } from './logger.js';

export { type PinoLike, type PinoLogFn, createPinoLogger } from './pino.js';

export { type SerializedError, serializeError, serializeContext } from './serializers.js';

export {
  type UrlRedactionConfig,
  type ParsedUrlRedactionConfig,
  urlRedactionConfigSchema,
  DEFAULT_SENSITIVE_KEYS,
  redactUrl,
  redactUrlsInText,
  redactContext,
  withUrlRedaction,
} from './redaction.js';
