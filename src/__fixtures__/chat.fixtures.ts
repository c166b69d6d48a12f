import type { ChatCompletion, ChatCompletionChunk } from '../services/chat/types.js';

export function createChatCompletion(overrides?: Partial<ChatCompletion>): ChatCompletion {
  return {
    id: 'chatcmpl-test-1',
    object: 'chat.completion',
    created: 1700000000,
    model: 'gpt-4o',
    choices: [
      {
        index: 0,
        message: {
          role: 'assistant',
          content: 'Hello there! How can I help?',
        },
        finish_reason: 'stop',
      },
    ],
    usage: {
      prompt_tokens: 9,
      completion_tokens: 7,
      total_tokens: 16,
    },
    ...overrides,
  };
}

export function createChatCompletionChunk(
  overrides?: Partial<ChatCompletionChunk>
): ChatCompletionChunk {
  return {
    id: 'chatcmpl-test-1',
    object: 'chat.completion.chunk',
    created: 1700000000,
    model: 'gpt-4o',
    choices: [
      {
        index: 0,
        delta: { content: 'Hello' },
        finish_reason: null,
      },
    ],
    ...overrides,
  };
}

/**
 * The chunks a deployment sends for `fragments`: a role preamble, one
 * chunk per fragment, and a closing chunk carrying only the finish reason.
 */
export function createStreamChunks(fragments: string[]): ChatCompletionChunk[] {
  return [
    createChatCompletionChunk({
      choices: [{ index: 0, delta: { role: 'assistant', content: '' }, finish_reason: null }],
    }),
    ...fragments.map(content =>
      createChatCompletionChunk({
        choices: [{ index: 0, delta: { content }, finish_reason: null }],
      })
    ),
    createChatCompletionChunk({
      choices: [{ index: 0, delta: {}, finish_reason: 'stop' }],
    }),
  ];
}
