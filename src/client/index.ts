export type { ChatClient } from './client-impl.js';
export { ChatClientImpl, createClient } from './client-impl.js';
export type { ClientOptions, Environment } from './config.js';
export { normalizeClientOptions, clientOptionsFromEnv, CLIENT_DEFAULTS } from './config.js';
export { createClientFromEnv, ChatClientBuilder, builder } from './factory.js';
