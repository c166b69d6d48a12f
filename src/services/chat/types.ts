/**
 * Chat Completion Types
 *
 * Wire shapes for the chat completions API. The single-shot response and
 * the streaming chunk are distinct records: one carries `message`, the
 * other `delta`.
 */

import { z } from 'zod';

/** Chat message roles the client sends */
export type ChatRole = 'system' | 'user' | 'assistant';

/** Outbound conversation message */
export interface ChatMessage {
  role: ChatRole;
  content: string;
}

/** Outbound request body */
export interface ChatCompletionRequestBody {
  messages: ChatMessage[];
  temperature: number;
  max_tokens: number;
  top_p: number;
  frequency_penalty: number;
  presence_penalty: number;
  stop?: string[];
  stream: boolean;
}

export const ChatUsageSchema = z.object({
  prompt_tokens: z.number().int().nonnegative(),
  completion_tokens: z.number().int().nonnegative(),
  total_tokens: z.number().int().nonnegative(),
});

export type ChatUsage = z.infer<typeof ChatUsageSchema>;

const FinishReasonSchema = z.string().nullish();

// Single-shot response

export const ResponseMessageSchema = z.object({
  role: z.string().optional(),
  content: z.string().nullish(),
});

export const ChatChoiceSchema = z.object({
  index: z.number().int().nonnegative(),
  message: ResponseMessageSchema,
  finish_reason: FinishReasonSchema,
});

export const ChatCompletionSchema = z.object({
  id: z.string().optional(),
  object: z.string().optional(),
  created: z.number().optional(),
  model: z.string().optional(),
  choices: z.array(ChatChoiceSchema),
  usage: ChatUsageSchema.nullish(),
});

export type ResponseMessage = z.infer<typeof ResponseMessageSchema>;
export type ChatChoice = z.infer<typeof ChatChoiceSchema>;
export type ChatCompletion = z.infer<typeof ChatCompletionSchema>;

// Streaming chunk

export const ChatDeltaSchema = z.object({
  role: z.string().optional(),
  content: z.string().nullish(),
});

export const ChatChunkChoiceSchema = z.object({
  index: z.number().int().nonnegative(),
  // Content-filter-only choices arrive without a delta
  delta: ChatDeltaSchema.default({}),
  finish_reason: FinishReasonSchema,
});

export const ChatCompletionChunkSchema = z.object({
  id: z.string().optional(),
  object: z.string().optional(),
  created: z.number().optional(),
  model: z.string().optional(),
  choices: z.array(ChatChunkChoiceSchema),
  usage: ChatUsageSchema.nullish(),
});

export type ChatDelta = z.infer<typeof ChatDeltaSchema>;
export type ChatChunkChoice = z.infer<typeof ChatChunkChoiceSchema>;
export type ChatCompletionChunk = z.infer<typeof ChatCompletionChunkSchema>;

export function createUserMessage(content: string): ChatMessage {
  return { role: 'user', content };
}

export function createSystemMessage(content: string): ChatMessage {
  return { role: 'system', content };
}

export function createAssistantMessage(content: string): ChatMessage {
  return { role: 'assistant', content };
}
