export {
  createChatCompletion,
  createChatCompletionChunk,
  createStreamChunks,
} from './chat.fixtures.js';

export {
  formatSSEEvent,
  createSSEStream,
  createChunkSSE,
  createChatStreamSSE,
  splitBytes,
  createTrackedBody,
} from './streams.fixtures.js';
export type { SSEEvent, TrackedBody } from './streams.fixtures.js';

export {
  createErrorBody,
  createRateLimitErrorBody,
  createUnauthorizedErrorBody,
  createContentFilterErrorBody,
} from './errors.fixtures.js';
