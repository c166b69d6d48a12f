/**
 * Common Types
 *
 * Transport-level shapes shared by the request builder, services and client.
 */

import { z } from 'zod';

/** Azure API versions known to serve chat completions */
export type ApiVersion =
  | '2024-06-01'
  | '2024-08-01-preview'
  | '2024-10-21'
  | '2024-10-01-preview'
  | '2023-05-15'
  | '2023-12-01-preview'
  | (string & {});

/** How the credential is presented to the service */
export type AuthScheme = 'api-key' | 'bearer';

/**
 * Endpoint and credential, fixed for the lifetime of a client and shared
 * read-only by every request it issues.
 */
export interface ClientIdentity {
  /** Resource endpoint, or the complete completions URL when no deployment is configured */
  readonly endpoint: string;
  readonly apiKey: string;
  readonly authScheme: AuthScheme;
  readonly apiVersion: ApiVersion;
  /** Default timeout in milliseconds */
  readonly timeout: number;
  /** Headers sent with every request */
  readonly headers: Readonly<Record<string, string>>;
}

/** HTTP methods the client issues */
export type HttpMethod = 'POST';

/** A fully formed outbound request; built without I/O */
export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  /** Serialized JSON body */
  body: string;
}

/** Per-call options */
export interface RequestOptions {
  /**
   * Timeout in milliseconds. Covers the whole exchange for single-shot
   * calls and the setup (until headers arrive) for streaming calls.
   */
  timeout?: number;
  /** Caller cancellation; aborting it cancels the request or the stream */
  signal?: AbortSignal;
  /** Extra headers for this call only */
  headers?: Record<string, string>;
}

/**
 * Structured error body returned by the service on failure.
 */
export const ErrorBodySchema = z.object({
  error: z.object({
    code: z.union([z.string(), z.number().transform(String)]).nullish(),
    message: z.string().nullish(),
    param: z.string().nullish(),
    type: z.string().nullish(),
  }),
});

export type ErrorBody = z.infer<typeof ErrorBodySchema>;
