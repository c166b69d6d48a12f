export { AzureUrlBuilder, buildChatCompletionsUrl, DEFAULT_API_VERSION } from './url-builder.js';
export type { AzureOperation } from './url-builder.js';
export { buildChatRequest, buildRequestBody } from './request-builder.js';
export type { ChatRequestInput } from './request-builder.js';
export { SseDecoder, LineBuffer, parseChunkPayload, DONE_SENTINEL } from './sse-decoder.js';
export type { DecoderEvent, DecoderState } from './sse-decoder.js';
export { linkSignals, startTimeout, readWithAbort, withAbort } from './abort.js';
export type { LinkedAbort } from './abort.js';
