import { describe, it, expect } from 'vitest';
import { extractRetryAfter, mapFetchError, mapResponseToError } from '../mapping.js';
import { ApiError, ConfigError, ParseError, RequestError, isChatClientError } from '../error.js';
import { createContentFilterErrorBody } from '../../__fixtures__/index.js';

describe('Error Mapping', () => {
  describe('mapResponseToError', () => {
    it('should read message, code and type from a structured body', async () => {
      const response = new Response(JSON.stringify(createContentFilterErrorBody()), {
        status: 400,
        headers: { 'apim-request-id': 'apim-1' },
      });

      const error = await mapResponseToError(response);

      expect(error).toBeInstanceOf(ApiError);
      expect(error.statusCode).toBe(400);
      expect(error.code).toBe('content_filter');
      expect(error.type).toBe('invalid_request_error');
      expect(error.message).toBe(
        'The response was filtered due to the prompt triggering content management policy.'
      );
      expect(error.requestId).toBe('apim-1');
      expect(error.retryable).toBe(false);
    });

    it('should accept a numeric error code', async () => {
      const response = new Response('{"error":{"code":429,"message":"slow down"}}', { status: 429 });

      const error = await mapResponseToError(response);

      expect(error.code).toBe('429');
      expect(error.retryable).toBe(true);
    });

    it('should fall back to the raw text', async () => {
      const error = await mapResponseToError(new Response('  gateway down \n', { status: 503 }));

      expect(error.message).toBe('gateway down');
      expect(error.code).toBeUndefined();
    });

    it('should fall back to the status text for an empty body', async () => {
      const error = await mapResponseToError(new Response(null, { status: 404, statusText: 'Not Found' }));

      expect(error.message).toBe('Not Found');
    });

    it('should report an unknown error when nothing describes it', async () => {
      const error = await mapResponseToError(new Response(null, { status: 500 }));

      expect(error.message).toBe('Unknown error');
    });

    it('should prefer x-request-id over the service request ids', async () => {
      const response = new Response('{}', {
        status: 500,
        headers: { 'x-request-id': 'req-1', 'x-ms-request-id': 'ms-1' },
      });

      expect((await mapResponseToError(response)).requestId).toBe('req-1');
    });
  });

  describe('extractRetryAfter', () => {
    it('should read delta seconds', () => {
      expect(extractRetryAfter(new Headers({ 'retry-after': '3' }))).toBe(3000);
    });

    it('should read an HTTP date relative to now', () => {
      const now = Date.parse('2024-01-01T00:00:00Z');
      const headers = new Headers({ 'retry-after': 'Mon, 01 Jan 2024 00:00:05 GMT' });

      expect(extractRetryAfter(headers, now)).toBe(5000);
    });

    it('should not go negative for a past date', () => {
      const now = Date.parse('2024-01-01T00:00:10Z');
      const headers = new Headers({ 'retry-after': 'Mon, 01 Jan 2024 00:00:05 GMT' });

      expect(extractRetryAfter(headers, now)).toBe(0);
    });

    it('should ignore a missing or unreadable header', () => {
      expect(extractRetryAfter(new Headers())).toBeUndefined();
      expect(extractRetryAfter(new Headers({ 'retry-after': 'soon' }))).toBeUndefined();
    });
  });

  describe('mapFetchError', () => {
    it('should pass client errors through', () => {
      const original = new ParseError({ message: 'bad' });

      expect(mapFetchError(original)).toBe(original);
    });

    it('should report the client timeout', () => {
      const timeout = new AbortController();
      timeout.abort();

      const error = mapFetchError(new DOMException('aborted', 'AbortError'), { timeout: timeout.signal });

      expect(error).toBeInstanceOf(RequestError);
      expect(error).toMatchObject({ reason: 'timeout', message: 'Request timed out', retryable: true });
    });

    it('should report a caller abort', () => {
      const caller = new AbortController();
      caller.abort();

      const error = mapFetchError(new DOMException('aborted', 'AbortError'), { caller: caller.signal });

      expect(error).toMatchObject({ reason: 'aborted', retryable: false });
    });

    it('should report a caller timeout signal as a timeout', () => {
      const caller = new AbortController();
      caller.abort(new DOMException('timed out', 'TimeoutError'));

      expect(mapFetchError(new Error('x'), { caller: caller.signal })).toMatchObject({ reason: 'timeout' });
    });

    it('should include the underlying cause of a network failure', () => {
      const error = mapFetchError(new TypeError('fetch failed', { cause: new Error('getaddrinfo ENOTFOUND') }));

      expect(error).toMatchObject({
        reason: 'network',
        message: 'HTTP request failed: fetch failed (getaddrinfo ENOTFOUND)',
      });
    });

    it('should describe non-error values', () => {
      expect(mapFetchError('boom').message).toBe('HTTP request failed: boom');
    });
  });

  describe('error types', () => {
    it('should serialize with their kind', () => {
      const error = new ConfigError({ message: 'bad field', field: 'temperature' });

      expect(error.toJSON()).toEqual({
        name: 'ConfigError',
        kind: 'config',
        message: 'bad field',
        retryable: false,
        field: 'temperature',
      });
    });

    it('should be recognized by the guard', () => {
      expect(isChatClientError(new ApiError({ message: 'x', statusCode: 500 }))).toBe(true);
      expect(isChatClientError(new Error('x'))).toBe(false);
    });
  });
});
