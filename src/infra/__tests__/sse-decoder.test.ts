import { describe, it, expect } from 'vitest';
import { LineBuffer, SseDecoder, parseChunkPayload } from '../sse-decoder.js';
import type { DecoderEvent } from '../sse-decoder.js';
import { ParseError } from '../../errors/index.js';
import { splitBytes } from '../../__fixtures__/index.js';

const HELLO_STREAM =
  'data: {"choices":[{"delta":{"content":"Hel"},"index":0}]}\n\n' +
  'data: {"choices":[{"delta":{"content":"lo"},"index":0}]}\n\n' +
  'data: [DONE]\n\n';

function contentChunk(content: string): string {
  return `data: ${JSON.stringify({ choices: [{ delta: { content }, index: 0 }] })}\n\n`;
}

function fragments(events: DecoderEvent[]): string[] {
  const texts: string[] = [];
  for (const event of events) {
    if (event.type === 'fragment') texts.push(event.text);
  }
  return texts;
}

function decodeAll(pieces: Array<Uint8Array | string>): DecoderEvent[] {
  const decoder = new SseDecoder();
  const events: DecoderEvent[] = [];
  for (const piece of pieces) {
    events.push(...decoder.push(piece));
  }
  events.push(...decoder.end());
  return events;
}

describe('LineBuffer', () => {
  it('should split on LF, CRLF and CR', () => {
    const buffer = new LineBuffer();

    expect(buffer.push('a\nb\r\nc\rd')).toEqual(['a', 'b', 'c']);
    expect(buffer.pending).toBe(1);
    expect(buffer.flush()).toBe('d');
    expect(buffer.flush()).toBeUndefined();
  });

  it('should join a line split across pushes', () => {
    const buffer = new LineBuffer();

    expect(buffer.push('data: {"a"')).toEqual([]);
    expect(buffer.push(':1}\n')).toEqual(['data: {"a":1}']);
  });

  it('should treat CRLF split across pushes as one terminator', () => {
    const buffer = new LineBuffer();

    expect(buffer.push('first\r')).toEqual(['first']);
    expect(buffer.push('\nsecond\n')).toEqual(['second']);
  });

  it('should keep blank lines', () => {
    const buffer = new LineBuffer();

    expect(buffer.push('x\n\ny\n')).toEqual(['x', '', 'y']);
  });
});

describe('parseChunkPayload', () => {
  it('should parse a chunk', () => {
    const result = parseChunkPayload('{"id":"c1","choices":[{"delta":{"content":"hi"},"index":0}]}');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.chunk.id).toBe('c1');
    expect(result.chunk.choices[0].delta.content).toBe('hi');
  });

  it('should default a missing delta to an empty one', () => {
    const result = parseChunkPayload('{"choices":[{"index":0,"finish_reason":"content_filter"}]}');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.chunk.choices[0].delta).toEqual({});
  });

  it('should reject invalid JSON', () => {
    const result = parseChunkPayload('{oops');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ParseError);
    expect(result.error.message).toMatch(/^Malformed stream chunk: /);
    expect(result.error.raw).toBe('{oops');
  });

  it('should surface an error reported inside the stream', () => {
    const result = parseChunkPayload('{"error":{"message":"quota exceeded","code":"429"}}');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('Stream reported an error: quota exceeded');
  });

  it('should reject JSON of the wrong shape', () => {
    const result = parseChunkPayload('{"foo":1}');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('Unexpected stream chunk shape: choices: Required');
  });
});

describe('SseDecoder', () => {
  it('should emit fragments in order and stop at the sentinel', () => {
    const events = decodeAll([HELLO_STREAM]);

    expect(fragments(events)).toEqual(['Hel', 'lo']);
    expect(events[events.length - 1]).toEqual({ type: 'done' });
  });

  it('should emit each chunk before its fragments', () => {
    const decoder = new SseDecoder();

    const events = decoder.push(contentChunk('x'));

    expect(events.map(e => e.type)).toEqual(['chunk', 'fragment']);
  });

  it('should produce the same fragments at every byte split', () => {
    const bytes = new TextEncoder().encode(HELLO_STREAM);

    for (let offset = 1; offset < bytes.length; offset++) {
      const events = decodeAll(splitBytes(bytes, [offset]));
      expect(fragments(events)).toEqual(['Hel', 'lo']);
    }
  });

  it('should handle a body delivered one byte at a time', () => {
    const bytes = new TextEncoder().encode(HELLO_STREAM);
    const offsets = Array.from({ length: bytes.length - 1 }, (_, i) => i + 1);

    expect(fragments(decodeAll(splitBytes(bytes, offsets)))).toEqual(['Hel', 'lo']);
  });

  it('should reassemble multi-byte characters split across reads', () => {
    const body = contentChunk('héllo 😀') + 'data: [DONE]\n\n';
    const bytes = new TextEncoder().encode(body);

    for (let offset = 1; offset < bytes.length; offset++) {
      expect(fragments(decodeAll(splitBytes(bytes, [offset])))).toEqual(['héllo 😀']);
    }
  });

  it('should accept CRLF line endings', () => {
    const body = HELLO_STREAM.replace(/\n/g, '\r\n');

    expect(fragments(decodeAll([body]))).toEqual(['Hel', 'lo']);
  });

  it('should accept a data field without a space', () => {
    const events = decodeAll(['data:{"choices":[{"delta":{"content":"x"},"index":0}]}\n', 'data:[DONE]\n']);

    expect(fragments(events)).toEqual(['x']);
    expect(events[events.length - 1]).toEqual({ type: 'done' });
  });

  it('should ignore comments, other fields and keep-alives', () => {
    const events = decodeAll([
      ': keep-alive\n\n',
      'event: message\n',
      'id: 7\n',
      'data: \n\n',
      'data:    \n\n',
      contentChunk('ok'),
      'data: [DONE]\n\n',
    ]);

    expect(events.map(e => e.type)).toEqual(['chunk', 'fragment', 'done']);
  });

  it('should skip empty content deltas', () => {
    const events = decodeAll([
      'data: {"choices":[{"delta":{"role":"assistant","content":""},"index":0}]}\n\n',
      'data: {"choices":[{"delta":{"content":null},"index":0}]}\n\n',
      'data: {"choices":[{"delta":{},"index":0,"finish_reason":"stop"}]}\n\n',
    ]);

    expect(events.map(e => e.type)).toEqual(['chunk', 'chunk', 'chunk', 'finish', 'end']);
  });

  it('should order choices by index within a chunk', () => {
    const decoder = new SseDecoder();

    const events = decoder.push(
      'data: {"choices":[{"delta":{"content":"B"},"index":1},{"delta":{"content":"A"},"index":0,"finish_reason":"stop"}]}\n\n'
    );

    expect(events.slice(1)).toEqual([
      { type: 'fragment', text: 'A', choiceIndex: 0 },
      { type: 'finish', choiceIndex: 0, reason: 'stop' },
      { type: 'fragment', text: 'B', choiceIndex: 1 },
    ]);
  });

  it('should recognise a sentinel with surrounding whitespace', () => {
    const decoder = new SseDecoder();

    expect(decoder.push('data: [DONE]  \r\n')).toEqual([{ type: 'done' }]);
    expect(decoder.state).toBe('terminated');
  });

  it('should ignore input after the sentinel', () => {
    const decoder = new SseDecoder();
    decoder.push('data: [DONE]\n\n');

    expect(decoder.push(contentChunk('late'))).toEqual([]);
    expect(decoder.end()).toEqual([]);
  });

  it('should fail on a malformed chunk and ignore the rest', () => {
    const decoder = new SseDecoder();

    const events = decoder.push(contentChunk('Hel') + 'data: {oops\n\n' + contentChunk('lo'));

    expect(events.map(e => e.type)).toEqual(['chunk', 'fragment', 'error']);
    expect(decoder.state).toBe('failed');
    expect(decoder.push(contentChunk('more'))).toEqual([]);
    expect(decoder.end()).toEqual([]);

    const last = events[events.length - 1];
    expect(last.type === 'error' && last.error.raw).toBe('{oops');
  });

  it('should end normally when input stops without a sentinel', () => {
    const decoder = new SseDecoder();
    const events = [...decoder.push(contentChunk('a')), ...decoder.end()];

    expect(fragments(events)).toEqual(['a']);
    expect(events[events.length - 1]).toEqual({ type: 'end' });
    expect(decoder.state).toBe('terminated');
  });

  it('should process an unterminated last line at end of input', () => {
    const decoder = new SseDecoder();

    expect(decoder.push('data: {"choices":[{"delta":{"content":"x"},"index":0}]}')).toEqual([]);
    const events = decoder.end();

    expect(events.map(e => e.type)).toEqual(['chunk', 'fragment', 'end']);
  });

  it('should fail on a truncated last line at end of input', () => {
    const decoder = new SseDecoder();
    decoder.push('data: {"choices":[{"delta":');

    const events = decoder.end();

    expect(events.map(e => e.type)).toEqual(['error']);
    expect(decoder.state).toBe('failed');
  });
});
