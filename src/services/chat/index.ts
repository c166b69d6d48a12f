export type {
  ChatRole,
  ChatMessage,
  ChatCompletionRequestBody,
  ChatUsage,
  ResponseMessage,
  ChatChoice,
  ChatCompletion,
  ChatDelta,
  ChatChunkChoice,
  ChatCompletionChunk,
} from './types.js';
export {
  ChatCompletionSchema,
  ChatCompletionChunkSchema,
  createUserMessage,
  createSystemMessage,
  createAssistantMessage,
} from './types.js';
export type { ChatCompletionService, ChatServiceDependencies, ChatRequestOptions } from './service.js';
export { ChatCompletionServiceImpl, parseCompletion } from './service.js';
export type { ChatStreamState, ChatStreamInit } from './stream.js';
export { ChatStream, ChatStreamAccumulator } from './stream.js';
