import { describe, it, expect } from 'vitest';
import { ChatClientImpl, createClient } from '../client-impl.js';
import { createDefaultChatConfig } from '../../config/index.js';
import type { ChatConfig } from '../../config/index.js';
import { ConfigError } from '../../errors/index.js';
import { ConsoleLogger, LogLevel } from '../../observability/index.js';

describe('ChatClientImpl', () => {
  it('should default the chat configuration', () => {
    const client = createClient({ endpoint: 'https://example.com', apiKey: 'test-key' });

    expect(client.getConfig()).toEqual(createDefaultChatConfig());
  });

  it('should freeze a configuration passed as a plain object', () => {
    const config: ChatConfig = { ...createDefaultChatConfig(), deployment: 'gpt-4o' };

    const client = createClient({ endpoint: 'https://example.com', apiKey: 'test-key', config });

    expect(Object.isFrozen(client.getConfig())).toBe(true);
    expect(client.getConfig().deployment).toBe('gpt-4o');
  });

  it('should keep its own copy of the stop sequences', () => {
    const stop = ['END'];
    const config: ChatConfig = { ...createDefaultChatConfig(), stop };

    const client = createClient({ endpoint: 'https://example.com', apiKey: 'test-key', config });
    stop.push('MORE');

    expect(client.getConfig().stop).toEqual(['END']);
    expect(Object.isFrozen(client.getConfig().stop)).toBe(true);
  });

  it('should reject an out-of-range configuration before any request', () => {
    const config: ChatConfig = { ...createDefaultChatConfig(), temperature: 5 };

    expect(() => new ChatClientImpl({ endpoint: 'https://example.com', apiKey: 'test-key', config })).toThrow(
      ConfigError
    );
  });

  it('should reject a missing key', () => {
    expect(() => createClient({ endpoint: 'https://example.com', apiKey: '' })).toThrow(ConfigError);
  });

  it('should mask the key when logging', () => {
    const lines: string[] = [];
    const logger = new ConsoleLogger({
      level: LogLevel.Debug,
      timestamps: false,
      sink: (_level, line) => {
        lines.push(line);
      },
    });

    createClient({ endpoint: 'https://example.com/', apiKey: 'test-key', logger });

    expect(lines).toEqual(['[DEBUG] Chat client created {"endpoint":"https://example.com","apiKey":"***"}']);
  });
});
