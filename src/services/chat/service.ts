/**
 * Chat Completion Service
 *
 * Issues chat completion requests, single-shot or streaming.
 */

import type { ClientIdentity, HttpRequest, RequestOptions } from '../../types/index.js';
import type { ChatConfig } from '../../config/index.js';
import type { Logger } from '../../observability/index.js';
import type { ChatCompletion, ChatMessage } from './types.js';
import { mergeChatConfig } from '../../config/index.js';
import { buildChatRequest } from '../../infra/request-builder.js';
import { linkSignals, startTimeout, withAbort } from '../../infra/abort.js';
import { ParseError, mapFetchError, mapResponseToError } from '../../errors/index.js';
import type { AbortSources, ChatClientError } from '../../errors/index.js';
import { ChatCompletionSchema } from './types.js';
import { ChatStream } from './stream.js';

/** Longest raw body excerpt carried by a ParseError */
const MAX_RAW_EXCERPT = 2048;

/** Per-call options for chat requests */
export interface ChatRequestOptions extends RequestOptions {
  /** Overrides applied to the client's configuration for this call only */
  config?: Partial<ChatConfig>;
}

/** Chat completion service interface */
export interface ChatCompletionService {
  /**
   * Creates a chat completion and waits for the whole response
   */
  create(messages: readonly ChatMessage[], options?: ChatRequestOptions): Promise<ChatCompletion>;

  /**
   * Opens a streaming chat completion. Resolves once response headers
   * arrive; rejects if the request cannot be set up.
   */
  stream(messages: readonly ChatMessage[], options?: ChatRequestOptions): Promise<ChatStream>;
}

/** Service dependencies */
export interface ChatServiceDependencies {
  identity: ClientIdentity;
  config: ChatConfig;
  logger: Logger;
}

/**
 * Chat completion service implementation
 */
export class ChatCompletionServiceImpl implements ChatCompletionService {
  private readonly identity: ClientIdentity;
  private readonly config: ChatConfig;
  private readonly logger: Logger;

  constructor(deps: ChatServiceDependencies) {
    this.identity = deps.identity;
    this.config = deps.config;
    this.logger = deps.logger;
  }

  async create(
    messages: readonly ChatMessage[],
    options?: ChatRequestOptions
  ): Promise<ChatCompletion> {
    const request = this.buildRequest(messages, false, options);
    const timeout = startTimeout(options?.timeout ?? this.identity.timeout);
    const link = linkSignals(options?.signal, timeout.signal);
    const sources = { timeout: timeout.signal, caller: options?.signal };

    try {
      const response = await this.send(request, link.signal, sources);

      if (!response.ok) {
        throw await this.readError(response, link.signal, sources);
      }

      let text: string;
      try {
        text = await response.text();
      } catch (error) {
        throw mapFetchError(error, sources);
      }

      const completion = parseCompletion(text);
      this.logger.info('Received chat completion', {
        id: completion.id,
        choices: completion.choices.length,
      });
      return completion;
    } finally {
      timeout.clear();
      link.dispose();
    }
  }

  async stream(
    messages: readonly ChatMessage[],
    options?: ChatRequestOptions
  ): Promise<ChatStream> {
    const request = this.buildRequest(messages, true, options);
    const timeout = startTimeout(options?.timeout ?? this.identity.timeout);
    const link = linkSignals(options?.signal, timeout.signal);
    const sources = { timeout: timeout.signal, caller: options?.signal };

    let response: Response;
    try {
      response = await this.send(request, link.signal, sources);
      if (!response.ok) {
        throw await this.readError(response, link.signal, sources);
      }
    } catch (error) {
      link.dispose();
      throw error;
    } finally {
      // The setup timeout ends once a successful response is in; the caller's signal keeps covering the body
      timeout.clear();
    }

    if (!response.body) {
      link.dispose();
      throw new ParseError({ message: 'Streaming response has no body' });
    }

    const contentType = response.headers.get('content-type') ?? '';
    if (!contentType.includes('text/event-stream')) {
      this.logger.warn('Unexpected content type for streaming response', { contentType });
    }

    this.logger.debug('Chat stream opened', { status: response.status });
    return new ChatStream({
      body: response.body,
      signal: options?.signal,
      onCancel: reason => link.abort(reason),
      onClose: () => link.dispose(),
      logger: this.logger,
    });
  }

  /**
   * Maps a non-2xx response to its error while the request signal still bounds the body read.
   */
  private async readError(
    response: Response,
    signal: AbortSignal,
    sources: AbortSources
  ): Promise<ChatClientError> {
    let error: ChatClientError;
    try {
      error = await withAbort(mapResponseToError(response), signal);
    } catch (reason) {
      error = mapFetchError(reason, sources);
    }
    this.logger.error('API request failed', error, { status: response.status });
    return error;
  }

  private buildRequest(
    messages: readonly ChatMessage[],
    stream: boolean,
    options?: ChatRequestOptions
  ): HttpRequest {
    const config = options?.config ? mergeChatConfig(this.config, options.config) : this.config;
    const request = buildChatRequest({
      identity: this.identity,
      config,
      messages,
      stream,
      headers: options?.headers,
    });

    this.logger.info('Sending chat completion request', { stream, messages: messages.length });
    this.logger.debug('Request details', {
      url: request.url,
      contentLength: messages.reduce((total, m) => total + m.content.length, 0),
    });
    return request;
  }

  /**
   * Executes the HTTP request
   */
  private async send(
    request: HttpRequest,
    signal: AbortSignal,
    sources: { timeout?: AbortSignal; caller?: AbortSignal }
  ): Promise<Response> {
    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal,
      });
      this.logger.debug('Received response', { status: response.status });
      return response;
    } catch (error) {
      const mapped = mapFetchError(error, sources);
      this.logger.error('HTTP request failed', mapped);
      throw mapped;
    }
  }
}

/**
 * Decodes a single-shot response body
 *
 * @throws ParseError
 */
export function parseCompletion(text: string): ChatCompletion {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new ParseError({
      message: `Failed to parse API response: ${error instanceof Error ? error.message : String(error)}`,
      raw: excerpt(text),
      cause: error instanceof Error ? error : undefined,
    });
  }

  const result = ChatCompletionSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ParseError({
      message: `Failed to parse API response: ${issues.join(', ')}`,
      raw: excerpt(text),
    });
  }
  return result.data;
}

function excerpt(text: string): string {
  return text.length > MAX_RAW_EXCERPT ? text.slice(0, MAX_RAW_EXCERPT) : text;
}
