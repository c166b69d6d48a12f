/**
 * Client Factory
 *
 * Factory functions for creating chat clients.
 */

import type { ChatClient } from './client-impl.js';
import type { ClientOptions, Environment } from './config.js';
import type { ApiVersion, AuthScheme } from '../types/index.js';
import type { ChatConfig } from '../config/index.js';
import type { Logger } from '../observability/index.js';
import { ChatClientImpl, createClient } from './client-impl.js';
import { clientOptionsFromEnv } from './config.js';
import { chatConfig } from '../config/index.js';
import { ConfigError } from '../errors/index.js';

/**
 * Creates a client from environment variables
 *
 * Required env vars:
 * - AZURE_OPENAI_ENDPOINT: resource endpoint (or full completions URL)
 * - AZURE_OPENAI_API_KEY: API key
 *
 * Optional env vars:
 * - AZURE_OPENAI_DEPLOYMENT: deployment name
 * - AZURE_OPENAI_API_VERSION: API version
 * - AZURE_OPENAI_TIMEOUT: request timeout in ms
 * - AZURE_OPENAI_AUTH_SCHEME: "api-key" (default) or "bearer"
 */
export function createClientFromEnv(
  env: Environment = process.env,
  overrides: Partial<Omit<ClientOptions, 'endpoint' | 'apiKey'>> = {}
): ChatClient {
  const { options, deployment } = clientOptionsFromEnv(env);
  const config = overrides.config ?? (deployment ? chatConfig().deployment(deployment).build() : undefined);
  return createClient({ ...options, ...overrides, config });
}

/**
 * Client builder for fluent configuration
 */
export class ChatClientBuilder {
  private options: Partial<ClientOptions> = {};

  endpoint(url: string): this {
    this.options.endpoint = url;
    return this;
  }

  apiKey(key: string): this {
    this.options.apiKey = key;
    return this;
  }

  authScheme(scheme: AuthScheme): this {
    this.options.authScheme = scheme;
    return this;
  }

  apiVersion(version: ApiVersion): this {
    this.options.apiVersion = version;
    return this;
  }

  /**
   * Sets the request timeout in milliseconds
   */
  timeout(ms: number): this {
    this.options.timeout = ms;
    return this;
  }

  config(config: ChatConfig): this {
    this.options.config = config;
    return this;
  }

  logger(logger: Logger): this {
    this.options.logger = logger;
    return this;
  }

  /**
   * Adds a header sent with every request
   */
  header(name: string, value: string): this {
    this.options.headers = { ...this.options.headers, [name]: value };
    return this;
  }

  /**
   * Builds the client
   *
   * @throws ConfigError when the endpoint or API key is missing or invalid
   */
  build(): ChatClient {
    const { endpoint, apiKey } = this.options;
    if (!endpoint) {
      throw new ConfigError({ message: 'API URL is required', field: 'endpoint' });
    }
    if (!apiKey) {
      throw new ConfigError({ message: 'API key is required', field: 'apiKey' });
    }
    return new ChatClientImpl({ ...this.options, endpoint, apiKey });
  }
}

/**
 * Creates a client builder
 */
export function builder(): ChatClientBuilder {
  return new ChatClientBuilder();
}

export { createClient };
