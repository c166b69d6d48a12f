/**
 * SSE Stream Decoder
 *
 * Incremental decoder for the chat completions event stream. Bytes are
 * pushed in whatever pieces the transport delivers; each push returns the
 * events completed by that piece. A line split across pushes (or a UTF-8
 * sequence split across pushes) is held until it is whole, so the emitted
 * sequence does not depend on where the transport cut the body.
 *
 * State machine:
 *
 *   accumulating --(data: [DONE])------------> terminated
 *   accumulating --(end of input)------------> terminated
 *   accumulating --(malformed data payload)--> failed
 *
 * Once terminated or failed, further input is ignored.
 */

import { ParseError } from '../errors/index.js';
import { ErrorBodySchema } from '../types/index.js';
import { ChatCompletionChunkSchema } from '../services/chat/types.js';
import type { ChatCompletionChunk } from '../services/chat/types.js';

/** Terminal sentinel payload */
export const DONE_SENTINEL = '[DONE]';

const DATA_PREFIX = 'data:';

const LF = 0x0a;
const CR = 0x0d;

/** Decoder state */
export type DecoderState = 'accumulating' | 'terminated' | 'failed';

/** Events produced by the decoder */
export type DecoderEvent =
  /** A successfully parsed chunk, emitted before its fragments */
  | { type: 'chunk'; chunk: ChatCompletionChunk }
  /** A non-empty piece of generated text */
  | { type: 'fragment'; text: string; choiceIndex: number }
  | { type: 'finish'; choiceIndex: number; reason: string }
  /** The `[DONE]` sentinel was seen */
  | { type: 'done' }
  /** Input ended without a sentinel */
  | { type: 'end' }
  | { type: 'error'; error: ParseError };

/**
 * Splits text into lines on LF, CRLF or CR.
 *
 * A CR at the very end of a piece ends the line immediately; an LF opening
 * the next piece is then taken as the second half of that CRLF.
 */
export class LineBuffer {
  private partial = '';
  private skipLeadingLf = false;

  push(text: string): string[] {
    const lines: string[] = [];
    let start = 0;

    if (this.skipLeadingLf && text.length > 0) {
      if (text.charCodeAt(0) === LF) {
        start = 1;
      }
      this.skipLeadingLf = false;
    }

    for (let i = start; i < text.length; i++) {
      const code = text.charCodeAt(i);
      if (code !== LF && code !== CR) continue;

      lines.push(this.partial + text.slice(start, i));
      this.partial = '';

      if (code === CR) {
        if (i + 1 < text.length) {
          if (text.charCodeAt(i + 1) === LF) i++;
        } else {
          this.skipLeadingLf = true;
        }
      }
      start = i + 1;
    }

    this.partial += text.slice(start);
    return lines;
  }

  /**
   * Returns the unterminated remainder, if any, and clears it.
   */
  flush(): string | undefined {
    const rest = this.partial;
    this.partial = '';
    this.skipLeadingLf = false;
    return rest.length > 0 ? rest : undefined;
  }

  /** Characters held while waiting for a line terminator */
  get pending(): number {
    return this.partial.length;
  }
}

type ChunkParseResult =
  | { ok: true; chunk: ChatCompletionChunk }
  | { ok: false; error: ParseError };

/**
 * Parses one `data:` payload into a chunk. Never throws.
 */
export function parseChunkPayload(payload: string): ChunkParseResult {
  let json: unknown;
  try {
    json = JSON.parse(payload);
  } catch (error) {
    return {
      ok: false,
      error: new ParseError({
        message: `Malformed stream chunk: ${error instanceof Error ? error.message : String(error)}`,
        raw: payload,
        cause: error instanceof Error ? error : undefined,
      }),
    };
  }

  const result = ChatCompletionChunkSchema.safeParse(json);
  if (result.success) {
    return { ok: true, chunk: result.data };
  }

  const reported = ErrorBodySchema.safeParse(json);
  if (reported.success) {
    return {
      ok: false,
      error: new ParseError({
        message: `Stream reported an error: ${reported.data.error.message ?? 'unknown error'}`,
        raw: payload,
      }),
    };
  }

  const issues = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
  return {
    ok: false,
    error: new ParseError({
      message: `Unexpected stream chunk shape: ${issues.join(', ')}`,
      raw: payload,
    }),
  };
}

/**
 * Incremental decoder for one streaming response
 */
export class SseDecoder {
  private readonly lines = new LineBuffer();
  private readonly textDecoder = new TextDecoder('utf-8');
  private current: DecoderState = 'accumulating';

  get state(): DecoderState {
    return this.current;
  }

  /**
   * Feeds the next piece of the body.
   */
  push(input: Uint8Array | string): DecoderEvent[] {
    if (this.current !== 'accumulating') {
      return [];
    }
    const text = typeof input === 'string' ? input : this.textDecoder.decode(input, { stream: true });
    return this.processLines(this.lines.push(text));
  }

  /**
   * Signals that the body is exhausted. An unterminated last line is
   * processed like any other; a body without a sentinel ends normally.
   */
  end(): DecoderEvent[] {
    if (this.current !== 'accumulating') {
      return [];
    }

    const lines = this.lines.push(this.textDecoder.decode());
    const rest = this.lines.flush();
    if (rest !== undefined) {
      lines.push(rest);
    }

    const events = this.processLines(lines);
    if (this.current === 'accumulating') {
      this.current = 'terminated';
      events.push({ type: 'end' });
    }
    return events;
  }

  private processLines(lines: string[]): DecoderEvent[] {
    const events: DecoderEvent[] = [];
    for (const line of lines) {
      this.processLine(line, events);
      if (this.current !== 'accumulating') {
        break;
      }
    }
    return events;
  }

  private processLine(line: string, events: DecoderEvent[]): void {
    // Blank lines separate frames; comments and other fields carry nothing for us
    if (line.length === 0 || !line.startsWith(DATA_PREFIX)) {
      return;
    }

    let payload = line.slice(DATA_PREFIX.length);
    if (payload.startsWith(' ')) {
      payload = payload.slice(1);
    }

    const trimmed = payload.trim();
    if (trimmed === DONE_SENTINEL) {
      this.current = 'terminated';
      events.push({ type: 'done' });
      return;
    }

    // Keep-alive
    if (trimmed.length === 0) {
      return;
    }

    const parsed = parseChunkPayload(payload);
    if (!parsed.ok) {
      this.current = 'failed';
      events.push({ type: 'error', error: parsed.error });
      return;
    }

    const { chunk } = parsed;
    events.push({ type: 'chunk', chunk });

    const choices = [...chunk.choices].sort((a, b) => a.index - b.index);
    for (const choice of choices) {
      const text = choice.delta.content;
      if (typeof text === 'string' && text.length > 0) {
        events.push({ type: 'fragment', text, choiceIndex: choice.index });
      }
      if (choice.finish_reason) {
        events.push({ type: 'finish', choiceIndex: choice.index, reason: choice.finish_reason });
      }
    }
  }
}
