/**
 * Chat Client Implementation
 *
 * Main entry point: a single-shot `ask` and a streaming `askStream` over the
 * chat completions service. Holds only immutable state, so one instance
 * can serve any number of concurrent requests.
 */

import type { ClientOptions } from './config.js';
import type { ClientIdentity } from '../types/index.js';
import type { ChatConfig } from '../config/index.js';
import type { Logger } from '../observability/index.js';
import type { ChatCompletionService, ChatRequestOptions, ChatStream } from '../services/chat/index.js';
import { normalizeClientOptions } from './config.js';
import { createDefaultChatConfig, mergeChatConfig } from '../config/index.js';
import { NoopLogger, maskSecret } from '../observability/index.js';
import { ChatCompletionServiceImpl, createUserMessage } from '../services/chat/index.js';
import { ParseError } from '../errors/index.js';

/** Chat client interface */
export interface ChatClient {
  /** Chat completions service, for full responses and multi-message conversations */
  readonly chat: ChatCompletionService;

  /**
   * Sends one user message and returns the first choice's text
   */
  ask(prompt: string, options?: ChatRequestOptions): Promise<string>;

  /**
   * Sends one user message and returns the reply as a stream of text
   * fragments. Setup failures reject; later failures end the stream.
   */
  askStream(prompt: string, options?: ChatRequestOptions): Promise<ChatStream>;

  getConfig(): ChatConfig;
  getIdentity(): ClientIdentity;
}

/**
 * Chat client implementation
 */
export class ChatClientImpl implements ChatClient {
  public readonly chat: ChatCompletionService;

  private readonly identity: ClientIdentity;
  private readonly config: ChatConfig;
  private readonly logger: Logger;

  constructor(options: ClientOptions) {
    this.identity = normalizeClientOptions(options);

    // Copies and freezes the caller's value, stop sequences included
    this.config = mergeChatConfig(options.config ?? createDefaultChatConfig(), {});

    this.logger = options.logger ?? new NoopLogger();
    this.logger.debug('Chat client created', {
      endpoint: this.identity.endpoint,
      apiKey: maskSecret(this.identity.apiKey),
      deployment: this.config.deployment,
    });

    this.chat = new ChatCompletionServiceImpl({
      identity: this.identity,
      config: this.config,
      logger: this.logger,
    });
  }

  async ask(prompt: string, options?: ChatRequestOptions): Promise<string> {
    this.logger.debug('Message content length', { length: prompt.length });

    const completion = await this.chat.create([createUserMessage(prompt)], options);

    const first = completion.choices[0];
    if (!first) {
      const error = new ParseError({ message: 'No response choices available' });
      this.logger.error('No response choices available in API response', error);
      throw error;
    }
    if (typeof first.message.content !== 'string') {
      const error = new ParseError({
        message: `First choice carries no message content (finish reason: ${first.finish_reason ?? 'none'})`,
      });
      this.logger.error('Response choice without content', error);
      throw error;
    }
    return first.message.content;
  }

  async askStream(prompt: string, options?: ChatRequestOptions): Promise<ChatStream> {
    this.logger.debug('Message content length', { length: prompt.length });
    return this.chat.stream([createUserMessage(prompt)], options);
  }

  getConfig(): ChatConfig {
    return this.config;
  }

  getIdentity(): ClientIdentity {
    return this.identity;
  }
}

/**
 * Creates a chat client with the given options
 */
export function createClient(options: ClientOptions): ChatClient {
  return new ChatClientImpl(options);
}
