/**
 * Robot Factory
 * Builds a robot and its adapters from configuration
 */

import { type BotConfig, type ChatAdapterName, ConfigurationError, loadConfigFromEnv } from '../core/config.js';
import { createLogger, type Logger } from '../core/logger.js';
import type { ChatAdapterFactory } from '../chat/types.js';
import { createShellAdapter } from '../chat/shell.js';
import { createTelegramAdapter } from '../chat/telegram.js';
import type { StoreAdapter } from '../store/types.js';
import { createMemoryStore } from '../store/memory.js';
import { createSqliteStore } from '../store/sqlite.js';
import { Robot } from './robot.js';

/**
 * Builds the adapter factory for one configured chat adapter
 */
export type ChatAdapterBuilder = (config: BotConfig, logger: Logger) => ChatAdapterFactory;

export const defaultChatAdapters: Record<ChatAdapterName, ChatAdapterBuilder> = {
  shell: (_config, logger) => createShellAdapter({ logger: logger.child('chat:shell') }),
  telegram: (config, logger) => {
    const token = config.chat.token;
    if (!token) {
      throw new ConfigurationError('Missing required config: chat.token is required for the telegram adapter');
    }
    return createTelegramAdapter({ token, logger: logger.child('chat:telegram') });
  },
};

export interface RobotFactoryOptions {
  /** Custom config (defaults to loading from env) */
  config?: BotConfig;
  logger?: Logger;
  /** Adapter builders by name, merged over the defaults */
  adapters?: Partial<Record<ChatAdapterName, ChatAdapterBuilder>>;
  store?: StoreAdapter;
}

/**
 * Opens the configured store, creating the SQLite table if needed
 */
export function createStore(config: BotConfig, logger: Logger): StoreAdapter {
  if (config.store.adapter === 'memory') {
    return createMemoryStore();
  }

  const path = config.store.path;
  if (!path) {
    throw new ConfigurationError('Missing required config: store.path is required for the sqlite store');
  }

  try {
    const store = createSqliteStore(path);
    logger.info('Database migrations applied successfully', { path });
    return store;
  } catch (error) {
    const migrationError = error instanceof Error ? error : new Error(String(error));
    logger.error('Database migration failed', migrationError);
    throw new Error(`Database migration failed: ${migrationError.message}`, { cause: migrationError });
  }
}

/**
 * Creates a fully configured robot. Help is enabled separately, after
 * modules register, so it can override a module's own help command.
 */
export function createRobot(options: RobotFactoryOptions = {}): Robot {
  const config = options.config ?? loadConfigFromEnv();
  const logger = options.logger ?? createLogger(config.logging.level);

  const adapters = { ...defaultChatAdapters, ...options.adapters };
  const chat = adapters[config.chat.adapter](config, logger);
  const store = options.store ?? createStore(config, logger);

  return new Robot({
    name: config.bot.name,
    chat,
    store,
    logger,
  });
}
