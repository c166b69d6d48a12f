import type { ChatCompletionChunk } from '../services/chat/types.js';
import { createStreamChunks } from './chat.fixtures.js';

export interface SSEEvent {
  event?: string;
  data: string;
}

export function formatSSEEvent(event: SSEEvent): string {
  let result = '';
  if (event.event) {
    result += `event: ${event.event}\n`;
  }
  result += `data: ${event.data}\n\n`;
  return result;
}

export function createSSEStream(events: SSEEvent[]): string {
  return events.map(formatSSEEvent).join('');
}

/**
 * Formats chunks as an SSE body, with the `[DONE]` sentinel unless `done` is false.
 */
export function createChunkSSE(chunks: ChatCompletionChunk[], options: { done?: boolean } = {}): string {
  const events: SSEEvent[] = chunks.map(chunk => ({ data: JSON.stringify(chunk) }));
  if (options.done ?? true) {
    events.push({ data: '[DONE]' });
  }
  return createSSEStream(events);
}

/**
 * SSE body streaming `fragments` the way a deployment does.
 */
export function createChatStreamSSE(fragments: string[], options: { done?: boolean } = {}): string {
  return createChunkSSE(createStreamChunks(fragments), options);
}

/**
 * Splits bytes into pieces ending at each of the given offsets.
 */
export function splitBytes(bytes: Uint8Array, offsets: number[]): Uint8Array[] {
  const pieces: Uint8Array[] = [];
  let start = 0;
  for (const offset of [...offsets].sort((a, b) => a - b)) {
    if (offset <= start || offset >= bytes.length) continue;
    pieces.push(bytes.subarray(start, offset));
    start = offset;
  }
  pieces.push(bytes.subarray(start));
  return pieces;
}

/** A readable body that also reports whether it was cancelled */
export interface TrackedBody {
  body: ReadableStream<Uint8Array>;
  readonly cancelled: boolean;
  readonly cancelReason: unknown;
  /** Number of pieces handed to the reader so far */
  readonly pulled: number;
}

/**
 * Creates a pull-based body delivering `pieces` one per read. When `hold`
 * is set the body stays open after the last piece instead of closing.
 * An `error` is raised on the read after the last piece.
 */
export function createTrackedBody(
  pieces: Array<Uint8Array | string>,
  options: { hold?: boolean; error?: Error } = {}
): TrackedBody {
  const encoder = new TextEncoder();
  let index = 0;
  const state: { cancelled: boolean; cancelReason: unknown; pulled: number } = {
    cancelled: false,
    cancelReason: undefined,
    pulled: 0,
  };

  const body = new ReadableStream<Uint8Array>(
    {
      pull(controller) {
        if (index < pieces.length) {
          const piece = pieces[index++];
          controller.enqueue(typeof piece === 'string' ? encoder.encode(piece) : piece);
          state.pulled = index;
          return;
        }
        if (options.error) {
          controller.error(options.error);
          return;
        }
        if (options.hold) {
          return new Promise<void>(() => undefined);
        }
        controller.close();
      },
      cancel(reason) {
        state.cancelled = true;
        state.cancelReason = reason;
      },
    },
    { highWaterMark: 0 }
  );

  return {
    body,
    get cancelled() {
      return state.cancelled;
    },
    get cancelReason() {
      return state.cancelReason;
    },
    get pulled() {
      return state.pulled;
    },
  };
}
