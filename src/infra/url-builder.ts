/**
 * URL Builder
 *
 * Constructs deployment URLs following the format:
 * {endpoint}/openai/deployments/{deployment}/{operation}?api-version={version}
 *
 * Without a deployment the endpoint is taken to be the complete operation URL.
 */

import type { ApiVersion } from '../types/index.js';
import { ConfigError } from '../errors/index.js';

/** Operations the client calls */
export type AzureOperation = 'chat/completions';

export const DEFAULT_API_VERSION: ApiVersion = '2024-06-01';

/**
 * URL Builder for deployment endpoints
 */
export class AzureUrlBuilder {
  private readonly endpoint: string;
  private deployment?: string;
  private operation: AzureOperation = 'chat/completions';
  private apiVersion: ApiVersion = DEFAULT_API_VERSION;
  private queryParams: Map<string, string> = new Map();

  constructor(endpoint: string) {
    this.endpoint = endpoint.replace(/\/+$/, '');
  }

  /**
   * Creates a new URL builder for an endpoint
   */
  static for(endpoint: string): AzureUrlBuilder {
    return new AzureUrlBuilder(endpoint);
  }

  withDeployment(deployment: string | undefined): this {
    this.deployment = deployment;
    return this;
  }

  withOperation(operation: AzureOperation): this {
    this.operation = operation;
    return this;
  }

  withApiVersion(version: ApiVersion): this {
    this.apiVersion = version;
    return this;
  }

  withQueryParam(key: string, value: string): this {
    this.queryParams.set(key, value);
    return this;
  }

  /**
   * Builds the complete URL
   */
  build(): string {
    let url: URL;
    try {
      url = this.deployment
        ? new URL(
            `${this.endpoint}/openai/deployments/${encodeURIComponent(this.deployment)}/${this.operation}`
          )
        : new URL(this.endpoint);
    } catch (error) {
      throw new ConfigError({
        message: `Invalid endpoint URL: ${this.endpoint}`,
        field: 'endpoint',
        cause: error instanceof Error ? error : undefined,
      });
    }

    if (this.deployment) {
      url.searchParams.set('api-version', this.apiVersion);
    }

    for (const [key, value] of this.queryParams) {
      url.searchParams.set(key, value);
    }

    return url.toString();
  }
}

/**
 * Convenience function to build the chat completions URL
 */
export function buildChatCompletionsUrl(
  endpoint: string,
  deployment: string | undefined,
  apiVersion: ApiVersion = DEFAULT_API_VERSION
): string {
  return AzureUrlBuilder.for(endpoint)
    .withDeployment(deployment)
    .withOperation('chat/completions')
    .withApiVersion(apiVersion)
    .build();
}
