import { describe, it, expect } from 'vitest';
import { ApiKeyAuthProvider, BearerAuthProvider, createAuthProvider } from '../auth-provider.js';
import { ConfigError } from '../../errors/index.js';

describe('Auth Providers', () => {
  it('should send the key in the api-key header', () => {
    const provider = createAuthProvider('test-key');

    expect(provider).toBeInstanceOf(ApiKeyAuthProvider);
    expect(provider.getScheme()).toBe('api-key');
    expect(provider.getAuthHeader()).toEqual(['api-key', 'test-key']);
  });

  it('should send a bearer token', () => {
    const provider = createAuthProvider('test-key', 'bearer');

    expect(provider).toBeInstanceOf(BearerAuthProvider);
    expect(provider.getAuthHeader()).toEqual(['Authorization', 'Bearer test-key']);
  });

  it('should reject an empty key', () => {
    expect(() => new ApiKeyAuthProvider('')).toThrow(ConfigError);
    expect(() => new BearerAuthProvider('')).toThrow(ConfigError);
  });
});
