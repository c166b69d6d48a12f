/**
 * Azure Chat Completions Client
 *
 * Client for chat completions on an Azure-hosted, OpenAI-compatible
 * deployment. Returns either the complete reply or a stream of text
 * fragments as the model generates them.
 *
 * @example
 * ```typescript
 * import { builder, chatConfig } from 'azure-chat-completions';
 *
 * const client = builder()
 *   .endpoint('https://my-resource.openai.azure.com')
 *   .apiKey(process.env.AZURE_OPENAI_API_KEY ?? '')
 *   .config(chatConfig().deployment('gpt-4o').temperature(0.2).build())
 *   .build();
 *
 * // Single-shot
 * const answer = await client.ask('Hello!');
 *
 * // Streaming
 * const stream = await client.askStream('Tell me a story', {
 *   signal: AbortSignal.timeout(30_000),
 * });
 * for await (const fragment of stream) {
 *   process.stdout.write(fragment);
 * }
 * ```
 *
 * @module azure-chat-completions
 */

// Client exports
export type { ChatClient, ClientOptions, Environment } from './client/index.js';
export {
  ChatClientImpl,
  createClient,
  createClientFromEnv,
  ChatClientBuilder,
  builder,
  normalizeClientOptions,
  clientOptionsFromEnv,
  CLIENT_DEFAULTS,
} from './client/index.js';

// Configuration exports
export type { ChatConfig } from './config/index.js';
export {
  ChatConfigBuilder,
  chatConfig,
  createDefaultChatConfig,
  validateChatConfig,
  mergeChatConfig,
  DEFAULT_TEMPERATURE,
  DEFAULT_MAX_TOKENS,
  DEFAULT_TOP_P,
  MAX_STOP_SEQUENCES,
} from './config/index.js';

// Type exports
export type {
  ApiVersion,
  AuthScheme,
  ClientIdentity,
  HttpRequest,
  RequestOptions,
} from './types/index.js';

// Auth exports
export type { AuthProvider, AuthHeader } from './auth/index.js';
export { ApiKeyAuthProvider, BearerAuthProvider, createAuthProvider } from './auth/index.js';

// Chat service exports
export type {
  ChatRole,
  ChatMessage,
  ChatCompletionRequestBody,
  ChatUsage,
  ChatChoice,
  ChatCompletion,
  ChatDelta,
  ChatChunkChoice,
  ChatCompletionChunk,
  ChatCompletionService,
  ChatRequestOptions,
  ChatStreamState,
} from './services/chat/index.js';
export {
  ChatCompletionServiceImpl,
  ChatStream,
  ChatStreamAccumulator,
  parseCompletion,
  createUserMessage,
  createSystemMessage,
  createAssistantMessage,
} from './services/chat/index.js';

// Infrastructure exports
export { AzureUrlBuilder, buildChatCompletionsUrl, buildChatRequest, buildRequestBody } from './infra/index.js';
export type { AzureOperation, DecoderEvent, DecoderState } from './infra/index.js';
export { SseDecoder, LineBuffer, DONE_SENTINEL } from './infra/index.js';

// Error exports
export {
  ChatClientError,
  RequestError,
  ApiError,
  ParseError,
  ConfigError,
  isChatClientError,
} from './errors/index.js';
export type { ChatError, ChatErrorKind, RequestFailureReason } from './errors/index.js';

// Observability exports
export type { Logger, LogConfig, LogEntry, LogSink } from './observability/index.js';
export { LogLevel, ConsoleLogger, NoopLogger, createLogger, parseLogLevel } from './observability/index.js';
