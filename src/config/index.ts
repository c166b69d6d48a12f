/**
 * Sampling configuration for chat completions.
 * @module config
 */

import { z } from 'zod';
import { ConfigError } from '../errors/index.js';

/**
 * Default sampling temperature.
 */
export const DEFAULT_TEMPERATURE = 0.7;

/**
 * Default completion length in tokens.
 */
export const DEFAULT_MAX_TOKENS = 800;

/**
 * Default nucleus sampling mass.
 */
export const DEFAULT_TOP_P = 0.95;

/**
 * Maximum number of stop sequences the service accepts.
 */
export const MAX_STOP_SEQUENCES = 4;

/**
 * Chat sampling configuration. Frozen once built.
 */
export interface ChatConfig {
  /** Sampling temperature, 0 to 2 */
  readonly temperature: number;
  /** Maximum tokens to generate */
  readonly maxTokens: number;
  /** Nucleus sampling parameter, 0 to 1 */
  readonly topP: number;
  /** Frequency penalty, -2 to 2 */
  readonly frequencyPenalty: number;
  /** Presence penalty, -2 to 2 */
  readonly presencePenalty: number;
  /** Stop sequences */
  readonly stop?: readonly string[];
  /** Deployment (model) name; templated into the request path */
  readonly deployment?: string;
}

/**
 * Zod schema for configuration validation.
 */
const chatConfigSchema = z.object({
  temperature: z.number().finite().min(0).max(2),
  maxTokens: z.number().int().positive().finite(),
  topP: z.number().finite().min(0).max(1),
  frequencyPenalty: z.number().finite().min(-2).max(2),
  presencePenalty: z.number().finite().min(-2).max(2),
  stop: z.array(z.string().min(1)).min(1).max(MAX_STOP_SEQUENCES).optional(),
  deployment: z.string().trim().min(1).optional(),
});

/**
 * Creates the default configuration.
 */
export function createDefaultChatConfig(): ChatConfig {
  return Object.freeze({
    temperature: DEFAULT_TEMPERATURE,
    maxTokens: DEFAULT_MAX_TOKENS,
    topP: DEFAULT_TOP_P,
    frequencyPenalty: 0,
    presencePenalty: 0,
  });
}

/**
 * Validates a configuration.
 *
 * @throws ConfigError naming the first offending field
 */
export function validateChatConfig(config: ChatConfig): void {
  const result = chatConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    const field = result.error.issues[0]?.path[0];
    throw new ConfigError({
      message: `Invalid configuration: ${issues.join(', ')}`,
      field: field === undefined ? undefined : String(field),
    });
  }
}

/**
 * Applies overrides to a configuration, validates, and freezes the result.
 */
export function mergeChatConfig(base: ChatConfig, overrides: Partial<ChatConfig>): ChatConfig {
  const merged: ChatConfig = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      Object.assign(merged, { [key]: value });
    }
  }
  return finalize(merged);
}

function finalize(config: ChatConfig): ChatConfig {
  validateChatConfig(config);
  return Object.freeze({
    ...config,
    stop: config.stop ? Object.freeze([...config.stop]) : undefined,
  });
}

/**
 * Configuration builder.
 *
 * Setters only record values; `build()` validates them all at once.
 */
export class ChatConfigBuilder {
  private config: ChatConfig;

  constructor() {
    this.config = createDefaultChatConfig();
  }

  /**
   * Sets the sampling temperature.
   */
  temperature(value: number): this {
    this.config = { ...this.config, temperature: value };
    return this;
  }

  /**
   * Sets the maximum number of tokens to generate.
   */
  maxTokens(value: number): this {
    this.config = { ...this.config, maxTokens: value };
    return this;
  }

  topP(value: number): this {
    this.config = { ...this.config, topP: value };
    return this;
  }

  frequencyPenalty(value: number): this {
    this.config = { ...this.config, frequencyPenalty: value };
    return this;
  }

  presencePenalty(value: number): this {
    this.config = { ...this.config, presencePenalty: value };
    return this;
  }

  /**
   * Sets stop sequences.
   */
  stop(sequences: readonly string[]): this {
    this.config = { ...this.config, stop: [...sequences] };
    return this;
  }

  /**
   * Sets the deployment the requests target.
   */
  deployment(name: string): this {
    this.config = { ...this.config, deployment: name };
    return this;
  }

  /**
   * Alias of {@link deployment}.
   */
  model(name: string): this {
    return this.deployment(name);
  }

  /**
   * Validates and returns the immutable configuration.
   *
   * @throws ConfigError
   */
  build(): ChatConfig {
    return finalize(this.config);
  }
}

/**
 * Creates a configuration builder.
 */
export function chatConfig(): ChatConfigBuilder {
  return new ChatConfigBuilder();
}
