import { describe, it, expect } from 'vitest';
import {
  chatConfig,
  createDefaultChatConfig,
  mergeChatConfig,
  validateChatConfig,
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
  DEFAULT_TOP_P,
} from '../index.js';
import { ConfigError } from '../../errors/index.js';

describe('Chat Configuration', () => {
  describe('createDefaultChatConfig', () => {
    it('should use the documented defaults', () => {
      expect(createDefaultChatConfig()).toEqual({
        temperature: DEFAULT_TEMPERATURE,
        maxTokens: DEFAULT_MAX_TOKENS,
        topP: DEFAULT_TOP_P,
        frequencyPenalty: 0,
        presencePenalty: 0,
      });
      expect(DEFAULT_TEMPERATURE).toBe(0.7);
      expect(DEFAULT_MAX_TOKENS).toBe(800);
      expect(DEFAULT_TOP_P).toBe(0.95);
    });

    it('should be frozen', () => {
      expect(Object.isFrozen(createDefaultChatConfig())).toBe(true);
    });
  });

  describe('ChatConfigBuilder', () => {
    it('should build a configuration from setters', () => {
      const config = chatConfig()
        .temperature(0.2)
        .maxTokens(100)
        .topP(0.5)
        .frequencyPenalty(1)
        .presencePenalty(-1)
        .stop(['END', '###'])
        .deployment('gpt-4o')
        .build();

      expect(config).toEqual({
        temperature: 0.2,
        maxTokens: 100,
        topP: 0.5,
        frequencyPenalty: 1,
        presencePenalty: -1,
        stop: ['END', '###'],
        deployment: 'gpt-4o',
      });
    });

    it('should treat model as an alias of deployment', () => {
      expect(chatConfig().model('gpt-35-turbo').build().deployment).toBe('gpt-35-turbo');
    });

    it('should freeze the result and its stop list', () => {
      const sequences = ['END'];
      const config = chatConfig().stop(sequences).build();
      sequences.push('LATER');

      expect(Object.isFrozen(config)).toBe(true);
      expect(config.stop).toEqual(['END']);
      expect(Object.isFrozen(config.stop)).toBe(true);
    });

    it('should accept the range bounds', () => {
      expect(() => chatConfig().temperature(0).topP(0).build()).not.toThrow();
      expect(() =>
        chatConfig().temperature(2).topP(1).frequencyPenalty(-2).presencePenalty(2).build()
      ).not.toThrow();
    });

    it.each([
      ['temperature', () => chatConfig().temperature(2.5)],
      ['temperature', () => chatConfig().temperature(-0.1)],
      ['temperature', () => chatConfig().temperature(Number.NaN)],
      ['maxTokens', () => chatConfig().maxTokens(0)],
      ['maxTokens', () => chatConfig().maxTokens(1.5)],
      ['topP', () => chatConfig().topP(1.1)],
      ['frequencyPenalty', () => chatConfig().frequencyPenalty(3)],
      ['presencePenalty', () => chatConfig().presencePenalty(-2.1)],
      ['stop', () => chatConfig().stop(['a', 'b', 'c', 'd', 'e'])],
      ['stop', () => chatConfig().stop([])],
      ['stop', () => chatConfig().stop([''])],
      ['deployment', () => chatConfig().deployment('  ')],
    ])('should reject an invalid %s', (field, make) => {
      const error = (() => {
        try {
          make().build();
        } catch (e) {
          return e;
        }
        return undefined;
      })();

      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toMatchObject({ kind: 'config', field });
    });

    it('should describe the failing field in the message', () => {
      expect(() => chatConfig().temperature(3).build()).toThrow(
        'Invalid configuration: temperature: Number must be less than or equal to 2'
      );
    });
  });

  describe('validateChatConfig', () => {
    it('should accept the defaults', () => {
      expect(() => validateChatConfig(createDefaultChatConfig())).not.toThrow();
    });
  });

  describe('mergeChatConfig', () => {
    it('should apply overrides and ignore undefined values', () => {
      const base = chatConfig().deployment('gpt-4o').build();

      const merged = mergeChatConfig(base, { temperature: 0, maxTokens: undefined });

      expect(merged.temperature).toBe(0);
      expect(merged.maxTokens).toBe(DEFAULT_MAX_TOKENS);
      expect(merged.deployment).toBe('gpt-4o');
      expect(base.temperature).toBe(DEFAULT_TEMPERATURE);
    });

    it('should validate the merged result', () => {
      expect(() => mergeChatConfig(createDefaultChatConfig(), { topP: 2 })).toThrow(ConfigError);
    });
  });
});
