/**
 * Request Builder
 *
 * Turns identity, configuration and messages into a complete HTTP request.
 * Pure: performs no I/O.
 */

import type { ChatConfig } from '../config/index.js';
import type { ClientIdentity, HttpRequest } from '../types/index.js';
import type { ChatCompletionRequestBody, ChatMessage } from '../services/chat/types.js';
import { createAuthProvider } from '../auth/index.js';
import { ConfigError } from '../errors/index.js';
import { buildChatCompletionsUrl } from './url-builder.js';

/** Printable ASCII; excludes CR, LF and other control characters */
const HEADER_VALUE_PATTERN = /^[\x20-\x7E]*$/;

/** RFC 7230 token characters */
const HEADER_NAME_PATTERN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;

/** Inputs for a chat completions request */
export interface ChatRequestInput {
  identity: ClientIdentity;
  config: ChatConfig;
  messages: readonly ChatMessage[];
  stream: boolean;
  /** Per-call headers, applied over the identity's defaults */
  headers?: Record<string, string>;
}

/**
 * Builds the JSON body for a chat completions call
 */
export function buildRequestBody(
  config: ChatConfig,
  messages: readonly ChatMessage[],
  stream: boolean
): ChatCompletionRequestBody {
  const body: ChatCompletionRequestBody = {
    messages: messages.map(m => ({ role: m.role, content: m.content })),
    temperature: config.temperature,
    max_tokens: config.maxTokens,
    top_p: config.topP,
    frequency_penalty: config.frequencyPenalty,
    presence_penalty: config.presencePenalty,
    stream,
  };
  if (config.stop) {
    body.stop = [...config.stop];
  }
  return body;
}

/**
 * Builds the chat completions request.
 *
 * @throws ConfigError when a header (the credential included) cannot be sent
 */
export function buildChatRequest(input: ChatRequestInput): HttpRequest {
  const { identity, config, messages, stream } = input;

  if (!identity.apiKey || !HEADER_VALUE_PATTERN.test(identity.apiKey)) {
    throw new ConfigError({
      message: 'Invalid header value: the API key must be non-empty printable ASCII',
      field: 'apiKey',
    });
  }

  const [authName, authValue] = createAuthProvider(identity.apiKey, identity.authScheme).getAuthHeader();

  const headers: Record<string, string> = {
    ...identity.headers,
    ...input.headers,
    'Content-Type': 'application/json',
    [authName]: authValue,
  };
  if (stream) {
    headers['Accept'] = 'text/event-stream';
  }

  for (const [name, value] of Object.entries(headers)) {
    assertHeader(name, value);
  }

  return {
    method: 'POST',
    url: buildChatCompletionsUrl(identity.endpoint, config.deployment, identity.apiVersion),
    headers,
    body: JSON.stringify(buildRequestBody(config, messages, stream)),
  };
}

function assertHeader(name: string, value: string): void {
  if (!HEADER_NAME_PATTERN.test(name)) {
    throw new ConfigError({ message: `Invalid header name: ${JSON.stringify(name)}`, field: 'headers' });
  }
  if (!HEADER_VALUE_PATTERN.test(value)) {
    throw new ConfigError({ message: `Invalid header value for ${name}`, field: 'headers' });
  }
}
