export type { AuthProvider, AuthHeader } from './auth-provider.js';
export { ApiKeyAuthProvider, BearerAuthProvider, createAuthProvider } from './auth-provider.js';
