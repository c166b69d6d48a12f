/**
 * Client Configuration
 *
 * Options accepted by the client and their normalization into the
 * immutable identity shared by every request.
 */

import { z } from 'zod';
import type { ApiVersion, AuthScheme, ClientIdentity } from '../types/index.js';
import type { ChatConfig } from '../config/index.js';
import type { Logger } from '../observability/index.js';
import { ConfigError } from '../errors/index.js';
import { DEFAULT_API_VERSION } from '../infra/url-builder.js';

/** Client configuration options */
export interface ClientOptions {
  /**
   * Resource endpoint, e.g. `https://my-resource.openai.azure.com`.
   * When the chat configuration names no deployment, this is the complete
   * chat completions URL instead.
   */
  endpoint: string;
  /** API key */
  apiKey: string;
  /** How the key is sent; defaults to the `api-key` header */
  authScheme?: AuthScheme;
  /** API version for deployment URLs */
  apiVersion?: ApiVersion;
  /** Request timeout in milliseconds */
  timeout?: number;
  /** Sampling configuration; defaults apply when absent */
  config?: ChatConfig;
  logger?: Logger;
  /** Headers sent with every request */
  headers?: Record<string, string>;
}

/** Default configuration values */
export const CLIENT_DEFAULTS: Readonly<{ apiVersion: ApiVersion; timeout: number; authScheme: AuthScheme }> = {
  apiVersion: DEFAULT_API_VERSION,
  timeout: 120000,
  authScheme: 'api-key',
};

const clientOptionsSchema = z.object({
  endpoint: z
    .string()
    .url()
    .refine(value => /^https?:\/\//i.test(value), { message: 'Endpoint must be an http(s) URL' }),
  apiKey: z.string().trim().min(1, { message: 'API key is required' }),
  authScheme: z.enum(['api-key', 'bearer']),
  apiVersion: z.string().min(1),
  timeout: z.number().int().positive(),
  headers: z.record(z.string()),
});

/**
 * Validates options and freezes them into a client identity.
 *
 * @throws ConfigError naming the offending field
 */
export function normalizeClientOptions(options: ClientOptions): ClientIdentity {
  const candidate = {
    endpoint: options.endpoint,
    apiKey: options.apiKey,
    authScheme: options.authScheme ?? CLIENT_DEFAULTS.authScheme,
    apiVersion: options.apiVersion ?? CLIENT_DEFAULTS.apiVersion,
    timeout: options.timeout ?? CLIENT_DEFAULTS.timeout,
    headers: options.headers ?? {},
  };

  const result = clientOptionsSchema.safeParse(candidate);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    const field = result.error.issues[0]?.path[0];
    throw new ConfigError({
      message: `Invalid client options: ${issues.join(', ')}`,
      field: field === undefined ? undefined : String(field),
    });
  }

  return Object.freeze({
    endpoint: candidate.endpoint.replace(/\/+$/, ''),
    apiKey: candidate.apiKey,
    authScheme: candidate.authScheme,
    apiVersion: candidate.apiVersion,
    timeout: candidate.timeout,
    headers: Object.freeze({ ...candidate.headers }),
  });
}

/** Environment read by {@link clientOptionsFromEnv} */
export type Environment = Record<string, string | undefined>;

/**
 * Creates client options from environment variables.
 *
 * Returns the deployment separately, since it belongs to the chat
 * configuration rather than to the client identity.
 */
export function clientOptionsFromEnv(
  env: Environment = process.env
): { options: ClientOptions; deployment?: string } {
  const endpoint = env.AZURE_OPENAI_ENDPOINT;
  if (!endpoint) {
    throw new ConfigError({
      message: 'AZURE_OPENAI_ENDPOINT environment variable is required',
      field: 'endpoint',
    });
  }

  const apiKey = env.AZURE_OPENAI_API_KEY;
  if (!apiKey) {
    throw new ConfigError({
      message: 'AZURE_OPENAI_API_KEY environment variable is required',
      field: 'apiKey',
    });
  }

  let timeout: number | undefined;
  if (env.AZURE_OPENAI_TIMEOUT) {
    timeout = Number(env.AZURE_OPENAI_TIMEOUT);
    if (!Number.isInteger(timeout) || timeout <= 0) {
      throw new ConfigError({
        message: `AZURE_OPENAI_TIMEOUT must be a positive integer, got "${env.AZURE_OPENAI_TIMEOUT}"`,
        field: 'timeout',
      });
    }
  }

  let authScheme: AuthScheme | undefined;
  const scheme = env.AZURE_OPENAI_AUTH_SCHEME;
  if (scheme === 'api-key' || scheme === 'bearer') {
    authScheme = scheme;
  } else if (scheme) {
    throw new ConfigError({
      message: `AZURE_OPENAI_AUTH_SCHEME must be "api-key" or "bearer", got "${scheme}"`,
      field: 'authScheme',
    });
  }

  return {
    options: {
      endpoint,
      apiKey,
      authScheme,
      apiVersion: env.AZURE_OPENAI_API_VERSION || undefined,
      timeout,
    },
    deployment: env.AZURE_OPENAI_DEPLOYMENT || undefined,
  };
}
