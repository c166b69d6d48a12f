/**
 * Chat Client Error Types
 *
 * A single tagged family covering transport, API, parse and configuration
 * failures. Narrow on `kind` (or `instanceof`) to tell them apart.
 */

/** Discriminant shared by every client error */
export type ChatErrorKind = 'request' | 'api' | 'parse' | 'config';

/** Why a transport-level request did not complete */
export type RequestFailureReason = 'network' | 'timeout' | 'aborted';

/** Base error options */
export interface ChatClientErrorOptions {
  message: string;
  cause?: Error;
}

/**
 * Base class for all chat client errors
 */
export abstract class ChatClientError extends Error {
  public abstract readonly kind: ChatErrorKind;
  public override readonly cause?: Error;

  constructor(options: ChatClientErrorOptions) {
    super(options.message);
    this.name = this.constructor.name;
    this.cause = options.cause;

    Error.captureStackTrace?.(this, this.constructor);
  }

  /** Whether repeating the same call may succeed */
  get retryable(): boolean {
    return false;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      retryable: this.retryable,
    };
  }
}

/**
 * Transport failure: the HTTP exchange could not complete
 * (connection refused, TLS, DNS, timeout, caller abort, broken body read).
 */
export class RequestError extends ChatClientError {
  public readonly kind = 'request' as const;
  public readonly reason: RequestFailureReason;

  constructor(options: ChatClientErrorOptions & { reason: RequestFailureReason }) {
    super(options);
    this.reason = options.reason;
  }

  override get retryable(): boolean {
    return this.reason !== 'aborted';
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), reason: this.reason };
  }
}

/** API error options */
export interface ApiErrorOptions extends ChatClientErrorOptions {
  statusCode: number;
  code?: string;
  type?: string;
  requestId?: string;
  retryAfterMs?: number;
}

/**
 * The service answered with a non-success status
 */
export class ApiError extends ChatClientError {
  public readonly kind = 'api' as const;
  public readonly statusCode: number;
  public readonly code?: string;
  public readonly type?: string;
  public readonly requestId?: string;
  public readonly retryAfterMs?: number;

  constructor(options: ApiErrorOptions) {
    super(options);
    this.statusCode = options.statusCode;
    this.code = options.code;
    this.type = options.type;
    this.requestId = options.requestId;
    this.retryAfterMs = options.retryAfterMs;
  }

  override get retryable(): boolean {
    return this.statusCode === 408 || this.statusCode === 429 || this.statusCode >= 500;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      statusCode: this.statusCode,
      code: this.code,
      type: this.type,
      requestId: this.requestId,
      retryAfterMs: this.retryAfterMs,
    };
  }
}

/**
 * A response body (streaming or not) did not match the expected shape
 */
export class ParseError extends ChatClientError {
  public readonly kind = 'parse' as const;
  /** The offending raw text, when available */
  public readonly raw?: string;

  constructor(options: ChatClientErrorOptions & { raw?: string }) {
    super(options);
    this.raw = options.raw;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), raw: this.raw };
  }
}

/**
 * Invalid local parameters, detected before any network call
 */
export class ConfigError extends ChatClientError {
  public readonly kind = 'config' as const;
  /** Name of the offending field */
  public readonly field?: string;

  constructor(options: ChatClientErrorOptions & { field?: string }) {
    super(options);
    this.field = options.field;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), field: this.field };
  }
}

/** Union of every concrete client error */
export type ChatError = RequestError | ApiError | ParseError | ConfigError;

/**
 * Type guard for client errors
 */
export function isChatClientError(value: unknown): value is ChatError {
  return (
    value instanceof RequestError ||
    value instanceof ApiError ||
    value instanceof ParseError ||
    value instanceof ConfigError
  );
}
