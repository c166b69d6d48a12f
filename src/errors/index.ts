export {
  ChatClientError,
  RequestError,
  ApiError,
  ParseError,
  ConfigError,
  isChatClientError,
} from './error.js';
export type {
  ChatErrorKind,
  ChatError,
  RequestFailureReason,
  ChatClientErrorOptions,
  ApiErrorOptions,
} from './error.js';
export { mapResponseToError, mapFetchError, extractRetryAfter } from './mapping.js';
export type { AbortSources } from './mapping.js';
