/**
 * Authentication Provider
 *
 * Produces the credential header for each request.
 */

import type { AuthScheme } from '../types/index.js';
import { ConfigError } from '../errors/index.js';

/** Authentication header tuple */
export type AuthHeader = [string, string];

/** Authentication provider interface */
export interface AuthProvider {
  /** Get the authentication header for requests */
  getAuthHeader(): AuthHeader;
  /** Get the authentication scheme */
  getScheme(): AuthScheme;
}

/**
 * Azure API key authentication (`api-key` header)
 */
export class ApiKeyAuthProvider implements AuthProvider {
  constructor(private readonly apiKey: string) {
    if (!apiKey) {
      throw new ConfigError({ message: 'API key is required', field: 'apiKey' });
    }
  }

  getAuthHeader(): AuthHeader {
    return ['api-key', this.apiKey];
  }

  getScheme(): AuthScheme {
    return 'api-key';
  }
}

/**
 * Bearer token authentication (`Authorization` header), as used by
 * OpenAI-compatible gateways in front of the deployment
 */
export class BearerAuthProvider implements AuthProvider {
  constructor(private readonly token: string) {
    if (!token) {
      throw new ConfigError({ message: 'API key is required', field: 'apiKey' });
    }
  }

  getAuthHeader(): AuthHeader {
    return ['Authorization', `Bearer ${this.token}`];
  }

  getScheme(): AuthScheme {
    return 'bearer';
  }
}

/**
 * Creates an auth provider for the given scheme
 */
export function createAuthProvider(apiKey: string, scheme: AuthScheme = 'api-key'): AuthProvider {
  switch (scheme) {
    case 'bearer':
      return new BearerAuthProvider(apiKey);
    case 'api-key':
      return new ApiKeyAuthProvider(apiKey);
  }
}
