export {
  type HeaderMap,
  type Transport,
  type TransportResponse,
  getHeader,
} from './types.js';

export {
  TOO_MANY_REQUESTS,
  MAX_REASON_BODY_LENGTH,
  MAX_RETRY_AFTER_MS,
  parseRetryAfter,
  describeResponse,
  classifyResponse,
  classifyTransportError,
} from './classifier.js';

export {
  type FetchTransportConfig,
  createFetchTransport,
} from './fetch-transport.js';
