/**
 * Error Mapping
 *
 * Maps HTTP responses and fetch failures to typed client errors.
 */

import { ErrorBodySchema } from '../types/index.js';
import { ApiError, ChatClientError, RequestError } from './error.js';

/**
 * Extracts request ID from response headers
 */
function extractRequestId(headers: Headers): string | undefined {
  return (
    headers.get('x-request-id') ??
    headers.get('x-ms-request-id') ??
    headers.get('apim-request-id') ??
    undefined
  );
}

/**
 * Extracts Retry-After header value in milliseconds
 */
export function extractRetryAfter(headers: Headers, now: number = Date.now()): number | undefined {
  const retryAfter = headers.get('retry-after');
  if (!retryAfter) return undefined;

  // Delay-seconds form
  if (/^\d+$/.test(retryAfter.trim())) {
    return parseInt(retryAfter, 10) * 1000;
  }

  const date = Date.parse(retryAfter);
  if (!isNaN(date)) {
    return Math.max(0, date - now);
  }

  return undefined;
}

/**
 * Maps a non-success HTTP response to an ApiError.
 *
 * Consumes the response body.
 */
export async function mapResponseToError(response: Response): Promise<ApiError> {
  // The status alone still describes the failure when the body cannot be read
  const text = await response.text().catch((): string => '');

  let message: string | undefined;
  let code: string | undefined;
  let type: string | undefined;

  if (text) {
    const parsed = parseErrorBody(text);
    message = parsed?.message;
    code = parsed?.code;
    type = parsed?.type;
  }

  return new ApiError({
    message: message ?? (text.trim() || response.statusText || 'Unknown error'),
    statusCode: response.status,
    code,
    type,
    requestId: extractRequestId(response.headers),
    retryAfterMs: extractRetryAfter(response.headers),
  });
}

function parseErrorBody(text: string): { message?: string; code?: string; type?: string } | undefined {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return undefined;
  }
  const result = ErrorBodySchema.safeParse(json);
  if (!result.success) {
    return undefined;
  }
  const { error } = result.data;
  return {
    message: error.message ?? undefined,
    code: error.code ?? undefined,
    type: error.type ?? undefined,
  };
}

/** Signals that may have aborted a request */
export interface AbortSources {
  /** Signal owned by the client's own timeout */
  timeout?: AbortSignal;
  /** Signal supplied by the caller */
  caller?: AbortSignal;
}

function isAbortLike(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

/**
 * Wraps a fetch or body-read failure into a RequestError
 */
export function mapFetchError(error: unknown, sources: AbortSources = {}): ChatClientError {
  if (error instanceof ChatClientError) {
    return error;
  }

  const cause = error instanceof Error ? error : undefined;

  if (sources.timeout?.aborted) {
    return new RequestError({ message: 'Request timed out', reason: 'timeout', cause });
  }

  if (sources.caller?.aborted) {
    const reason: unknown = sources.caller.reason;
    if (reason instanceof Error && reason.name === 'TimeoutError') {
      return new RequestError({ message: 'Request timed out', reason: 'timeout', cause });
    }
    return new RequestError({ message: 'Request was aborted', reason: 'aborted', cause });
  }

  if (isAbortLike(error)) {
    return new RequestError({ message: 'Request was aborted', reason: 'aborted', cause });
  }

  const detail = error instanceof Error ? describeCause(error) : String(error);
  return new RequestError({
    message: `HTTP request failed: ${detail}`,
    reason: 'network',
    cause,
  });
}

/**
 * undici reports "fetch failed" and keeps the useful part on `cause`
 */
function describeCause(error: Error): string {
  const inner: unknown = error.cause;
  if (inner instanceof Error && inner.message) {
    return `${error.message} (${inner.message})`;
  }
  return error.message;
}
