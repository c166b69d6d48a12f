/**
 * Chat Stream
 *
 * Wraps a streaming response body as a single-use async sequence of text
 * fragments. Leaving the sequence early, cancelling it, or aborting the
 * caller's signal releases the underlying connection.
 */

import type { Logger } from '../../observability/index.js';
import type { ChatCompletion, ChatCompletionChunk, ChatUsage } from './types.js';
import type { DecoderEvent } from '../../infra/sse-decoder.js';
import { NoopLogger } from '../../observability/index.js';
import { SseDecoder } from '../../infra/sse-decoder.js';
import { linkSignals, readWithAbort } from '../../infra/abort.js';
import { mapFetchError } from '../../errors/index.js';

/** Lifecycle of a stream */
export type ChatStreamState = 'idle' | 'streaming' | 'completed' | 'failed' | 'cancelled';

/** What a stream needs from the request that opened it */
export interface ChatStreamInit {
  body: ReadableStream<Uint8Array>;
  /** Caller's signal; aborting it ends the sequence with a RequestError */
  signal?: AbortSignal;
  /** Aborts the underlying HTTP request */
  onCancel?: (reason?: unknown) => void;
  /** Releases per-request resources once the stream is finished */
  onClose?: () => void;
  logger?: Logger;
}

/**
 * Collects streamed chunks into a complete response
 */
export class ChatStreamAccumulator {
  private readonly contents = new Map<number, string>();
  private readonly roles = new Map<number, string>();
  private readonly finishReasons = new Map<number, string>();
  private usage: ChatUsage | undefined;
  private id: string | undefined;
  private model: string | undefined;
  private created: number | undefined;

  /**
   * Adds a chunk to the accumulator
   */
  add(chunk: ChatCompletionChunk): void {
    this.id = chunk.id ?? this.id;
    this.model = chunk.model ?? this.model;
    this.created = chunk.created ?? this.created;

    for (const choice of chunk.choices) {
      if (choice.delta.role) {
        this.roles.set(choice.index, choice.delta.role);
      }
      if (choice.delta.content) {
        this.contents.set(choice.index, (this.contents.get(choice.index) ?? '') + choice.delta.content);
      } else if (!this.contents.has(choice.index)) {
        this.contents.set(choice.index, '');
      }
      if (choice.finish_reason) {
        this.finishReasons.set(choice.index, choice.finish_reason);
      }
    }

    if (chunk.usage) {
      this.usage = chunk.usage;
    }
  }

  getId(): string | undefined {
    return this.id;
  }

  getModel(): string | undefined {
    return this.model;
  }

  getContent(choiceIndex = 0): string {
    return this.contents.get(choiceIndex) ?? '';
  }

  getFinishReason(choiceIndex = 0): string | undefined {
    return this.finishReasons.get(choiceIndex);
  }

  /**
   * Gets the accumulated response in the single-shot shape
   */
  getResponse(): ChatCompletion {
    const indices = [...this.contents.keys()].sort((a, b) => a - b);
    return {
      id: this.id,
      object: 'chat.completion',
      created: this.created,
      model: this.model,
      choices: indices.map(index => ({
        index,
        message: {
          role: this.roles.get(index) ?? 'assistant',
          content: this.contents.get(index) ?? '',
        },
        finish_reason: this.finishReasons.get(index) ?? null,
      })),
      usage: this.usage,
    };
  }
}

/**
 * A lazily consumed, forward-only sequence of text fragments
 */
export class ChatStream implements AsyncIterable<string> {
  private readonly init: ChatStreamInit;
  private readonly logger: Logger;
  private readonly accumulator = new ChatStreamAccumulator();
  private readonly cancelController = new AbortController();
  private current: ChatStreamState = 'idle';
  private reader: ReadableStreamDefaultReader<Uint8Array> | undefined;
  private closed = false;
  private iterated = false;

  constructor(init: ChatStreamInit) {
    this.init = init;
    this.logger = init.logger ?? new NoopLogger();
  }

  get state(): ChatStreamState {
    return this.current;
  }

  /** Completion identifier, once the first chunk carrying one arrives */
  get id(): string | undefined {
    return this.accumulator.getId();
  }

  get model(): string | undefined {
    return this.accumulator.getModel();
  }

  /** Finish reason of the first choice, once reported */
  get finishReason(): string | undefined {
    return this.accumulator.getFinishReason(0);
  }

  /**
   * Everything received so far, in the single-shot response shape
   */
  snapshot(): ChatCompletion {
    return this.accumulator.getResponse();
  }

  [Symbol.asyncIterator](): AsyncIterator<string> {
    if (this.iterated) {
      throw new Error('ChatStream can only be iterated once');
    }
    this.iterated = true;
    if (this.current !== 'idle') {
      // Cancelled before the first read
      return { next: async () => ({ done: true, value: undefined }) };
    }
    this.current = 'streaming';
    return this.iterate();
  }

  /**
   * Stops the stream and releases the connection. A consumer still
   * iterating sees the sequence end without an error.
   */
  cancel(reason?: unknown): void {
    if (this.current === 'completed' || this.current === 'failed' || this.current === 'cancelled') {
      return;
    }
    // No reader yet means the body is still unlocked, even once an iterator was handed out
    const unread = this.reader === undefined;
    this.current = 'cancelled';
    this.cancelController.abort(reason);
    this.init.onCancel?.(reason);

    const pending = this.reader === undefined ? this.init.body.cancel(reason) : this.reader.cancel(reason);
    pending.then(
      () => {
        if (unread) this.close();
      },
      (error: unknown) => {
        this.logger.debug('Response body cancel failed', { error: String(error) });
        if (unread) this.close();
      }
    );
  }

  /**
   * Consumes the stream and returns the concatenated text
   */
  async text(): Promise<string> {
    let text = '';
    for await (const fragment of this) {
      text += fragment;
    }
    return text;
  }

  private async *iterate(): AsyncGenerator<string, void, undefined> {
    const reader = this.init.body.getReader();
    this.reader = reader;
    const decoder = new SseDecoder();
    const readSignal = linkSignals(this.init.signal, this.cancelController.signal);
    let fragments = 0;

    try {
      while (decoder.state === 'accumulating') {
        let result: ReadableStreamReadResult<Uint8Array>;
        try {
          result = await readWithAbort(reader, readSignal.signal);
        } catch (error) {
          if (this.isCancelled()) {
            return;
          }
          throw mapFetchError(error, { caller: this.init.signal });
        }
        if (this.isCancelled()) {
          return;
        }

        const events = result.done ? decoder.end() : decoder.push(result.value);
        for (const event of events) {
          // cancel() may run while a fragment from this read is being consumed
          if (this.isCancelled()) {
            return;
          }
          const text = this.apply(event);
          if (text !== undefined) {
            fragments++;
            yield text;
          }
        }
      }
      this.current = 'completed';
    } catch (error) {
      if (this.current === 'streaming') {
        this.current = 'failed';
      }
      this.logger.error('Chat stream failed', error instanceof Error ? error : undefined, { fragments });
      throw error;
    } finally {
      readSignal.dispose();
      if (this.current === 'streaming') {
        // Consumer left early
        this.current = 'cancelled';
      }
      if (this.current !== 'completed') {
        this.init.onCancel?.();
      }
      await reader.cancel().catch((error: unknown) => {
        this.logger.debug('Response body cancel failed', { error: String(error) });
      });
      reader.releaseLock();
      this.logger.debug('Chat stream closed', { state: this.current, fragments });
      this.close();
    }
  }

  /**
   * Applies one decoder event; returns the text to emit, if any.
   *
   * @throws ParseError on a malformed chunk
   */
  private apply(event: DecoderEvent): string | undefined {
    switch (event.type) {
      case 'chunk':
        this.accumulator.add(event.chunk);
        return undefined;
      case 'fragment':
        return event.text;
      case 'finish':
        this.logger.debug('Choice finished', { index: event.choiceIndex, reason: event.reason });
        return undefined;
      case 'done':
        this.logger.debug('Stream sentinel received');
        return undefined;
      case 'end':
        this.logger.debug('Stream closed by server without sentinel');
        return undefined;
      case 'error':
        throw event.error;
    }
  }

  private isCancelled(): boolean {
    return this.current === 'cancelled';
  }

  private close(): void {
    if (this.closed) return;
    this.closed = true;
    this.init.onClose?.();
  }
}
