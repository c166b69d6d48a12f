import type { ErrorBody } from '../types/index.js';

export function createErrorBody(
  message: string,
  code?: string | null,
  type?: string | null
): ErrorBody {
  return {
    error: {
      message,
      code: code ?? null,
      type: type ?? null,
      param: null,
    },
  };
}

export function createRateLimitErrorBody(): ErrorBody {
  return createErrorBody('rate limited', '429');
}

export function createUnauthorizedErrorBody(): ErrorBody {
  return createErrorBody(
    'Access denied due to invalid subscription key or wrong API endpoint.',
    '401'
  );
}

export function createContentFilterErrorBody(): ErrorBody {
  return createErrorBody(
    'The response was filtered due to the prompt triggering content management policy.',
    'content_filter',
    'invalid_request_error'
  );
}
