export type {
  ApiVersion,
  AuthScheme,
  ClientIdentity,
  HttpMethod,
  HttpRequest,
  RequestOptions,
  ErrorBody,
} from './common.js';
export { ErrorBodySchema } from './common.js';
