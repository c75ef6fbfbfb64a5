/**
 * Tests for the Robot Factory
 */

import { describe, it, expect, afterEach } from 'vitest';
import { createRobot, createStore, defaultChatAdapters } from './factory.js';
import { type BotConfig, ConfigurationError } from '../core/config.js';
import { createSilentLogger } from '../core/logger.js';
import { MockChatAdapter } from '../chat/mock-adapter.js';
import { ShellChatAdapter } from '../chat/shell.js';
import { TelegramChatAdapter } from '../chat/telegram.js';
import { MemoryStore } from '../store/memory.js';
import { SqliteStore } from '../store/sqlite.js';
import type { StoreAdapter } from '../store/types.js';

function config(overrides: Partial<BotConfig> = {}): BotConfig {
  return {
    bot: { name: 'bot', enableHelp: true },
    chat: { adapter: 'shell' },
    store: { adapter: 'memory' },
    logging: { level: 'error' },
    ...overrides,
  };
}

const logger = createSilentLogger();

describe('createStore', () => {
  const opened: StoreAdapter[] = [];

  afterEach(() => {
    opened.splice(0).forEach(store => store.close());
  });

  it('should create a memory store by default', () => {
    expect(createStore(config(), logger)).toBeInstanceOf(MemoryStore);
  });

  it('should open a migrated sqlite store', () => {
    const store = createStore(config({ store: { adapter: 'sqlite', path: ':memory:' } }), logger);
    opened.push(store);

    store.set('a', '1');

    expect(store).toBeInstanceOf(SqliteStore);
    expect(store.get('a')).toBe('1');
  });

  it('should require a path for sqlite', () => {
    expect(() => createStore(config({ store: { adapter: 'sqlite' } }), logger)).toThrow(ConfigurationError);
  });
});

describe('createRobot', () => {
  it('should build the configured adapter', () => {
    const robot = createRobot({ config: config({ bot: { name: 'victor', enableHelp: true } }), logger });

    expect(robot.name).toBe('victor');
    expect(robot.chat).toBeInstanceOf(ShellChatAdapter);
    expect(robot.store).toBeInstanceOf(MemoryStore);
  });

  it('should build the telegram adapter from the token', () => {
    const robot = createRobot({
      config: config({ chat: { adapter: 'telegram', token: '777:test-token' } }),
      logger,
    });

    expect(robot.chat).toBeInstanceOf(TelegramChatAdapter);
    expect(robot.chat.id).toBe('777');
  });

  it('should refuse telegram without a token', () => {
    expect(() => defaultChatAdapters.telegram(config({ chat: { adapter: 'telegram' } }), logger)).toThrow(
      'Missing required config: chat.token is required for the telegram adapter'
    );
  });

  it('should prefer adapters and stores passed in', () => {
    const store = new MemoryStore();
    const robot = createRobot({
      config: config(),
      logger,
      store,
      adapters: { shell: () => (r) => new MockChatAdapter(r) },
    });

    expect(robot.chat).toBeInstanceOf(MockChatAdapter);
    expect(robot.store).toBe(store);
  });
});
