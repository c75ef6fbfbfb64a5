/**
 * Config System
 * Loads and validates configuration from environment variables
 */

import 'dotenv/config';
import { type LogLevel, LOG_LEVELS, isLogLevel } from './logger.js';

export type ChatAdapterName = 'shell' | 'telegram';
export type StoreAdapterName = 'memory' | 'sqlite';

export interface BotConfig {
  bot: {
    name: string;
    enableHelp: boolean;
  };
  chat: {
    adapter: ChatAdapterName;
    token?: string;
  };
  store: {
    adapter: StoreAdapterName;
    path?: string;
  };
  logging: {
    level: LogLevel;
  };
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

const CHAT_ADAPTERS: readonly ChatAdapterName[] = ['shell', 'telegram'];
const STORE_ADAPTERS: readonly StoreAdapterName[] = ['memory', 'sqlite'];

export const DEFAULT_BOT_NAME = 'bot';

function isChatAdapterName(value: string): value is ChatAdapterName {
  return CHAT_ADAPTERS.some(adapter => adapter === value);
}

function isStoreAdapterName(value: string): value is StoreAdapterName {
  return STORE_ADAPTERS.some(adapter => adapter === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim() !== '';
}

function parseBoolean(name: string, value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }

  switch (value.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      throw new ConfigurationError(`Invalid ${name}: "${value}". Must be true or false`);
  }
}

/**
 * Validates a raw config object against the BotConfig schema
 * Throws ConfigurationError if validation fails
 */
export function validateConfig(config: unknown): config is BotConfig {
  if (!isRecord(config)) {
    throw new ConfigurationError('Config must be an object');
  }

  const { bot, chat, store, logging } = config;

  if (!isRecord(bot)) {
    throw new ConfigurationError('Missing required config section: bot');
  }
  if (!isNonEmptyString(bot.name)) {
    throw new ConfigurationError('Missing required config: bot.name must be a non-empty string');
  }
  if (typeof bot.enableHelp !== 'boolean') {
    throw new ConfigurationError('Invalid config: bot.enableHelp must be a boolean');
  }

  if (!isRecord(chat)) {
    throw new ConfigurationError('Missing required config section: chat');
  }
  if (typeof chat.adapter !== 'string' || !isChatAdapterName(chat.adapter)) {
    throw new ConfigurationError(
      `Invalid config: chat.adapter must be one of: ${CHAT_ADAPTERS.join(', ')}`
    );
  }
  if (chat.adapter === 'telegram' && !isNonEmptyString(chat.token)) {
    throw new ConfigurationError('Missing required config: chat.token is required for the telegram adapter');
  }

  if (!isRecord(store)) {
    throw new ConfigurationError('Missing required config section: store');
  }
  if (typeof store.adapter !== 'string' || !isStoreAdapterName(store.adapter)) {
    throw new ConfigurationError(
      `Invalid config: store.adapter must be one of: ${STORE_ADAPTERS.join(', ')}`
    );
  }
  if (store.adapter === 'sqlite' && !isNonEmptyString(store.path)) {
    throw new ConfigurationError('Missing required config: store.path is required for the sqlite store');
  }

  if (!isRecord(logging)) {
    throw new ConfigurationError('Missing required config section: logging');
  }
  if (typeof logging.level !== 'string' || !isLogLevel(logging.level)) {
    throw new ConfigurationError(
      `Invalid config: logging.level must be one of: ${LOG_LEVELS.join(', ')}`
    );
  }

  return true;
}

/**
 * Loads configuration from environment variables
 * Returns a validated BotConfig object
 */
export function loadConfigFromEnv(env: Record<string, string | undefined> = process.env): BotConfig {
  const name = env.BOT_NAME?.trim() || DEFAULT_BOT_NAME;

  const chatAdapter = env.CHAT_ADAPTER?.trim() || 'shell';
  if (!isChatAdapterName(chatAdapter)) {
    throw new ConfigurationError(
      `Invalid CHAT_ADAPTER: "${chatAdapter}". Must be one of: ${CHAT_ADAPTERS.join(', ')}`
    );
  }

  const token = env.TELEGRAM_BOT_TOKEN?.trim();
  if (chatAdapter === 'telegram' && !token) {
    throw new ConfigurationError('Missing required environment variable: TELEGRAM_BOT_TOKEN');
  }

  const storeAdapter = env.STORE_ADAPTER?.trim() || 'memory';
  if (!isStoreAdapterName(storeAdapter)) {
    throw new ConfigurationError(
      `Invalid STORE_ADAPTER: "${storeAdapter}". Must be one of: ${STORE_ADAPTERS.join(', ')}`
    );
  }

  const databasePath = env.DATABASE_PATH?.trim();
  if (storeAdapter === 'sqlite' && !databasePath) {
    throw new ConfigurationError('Missing required environment variable: DATABASE_PATH');
  }

  const logLevel = env.LOG_LEVEL?.trim() || 'info';
  if (!isLogLevel(logLevel)) {
    throw new ConfigurationError(
      `Invalid LOG_LEVEL: "${logLevel}". Must be one of: ${LOG_LEVELS.join(', ')}`
    );
  }

  return {
    bot: {
      name,
      enableHelp: parseBoolean('ENABLE_HELP', env.ENABLE_HELP, true),
    },
    chat: {
      adapter: chatAdapter,
      token: token || undefined,
    },
    store: {
      adapter: storeAdapter,
      path: databasePath || undefined,
    },
    logging: {
      level: logLevel,
    },
  };
}

/**
 * ConfigLoader class providing type-safe access to configuration
 */
export class ConfigLoader {
  private config: BotConfig | null = null;

  load(env: Record<string, string | undefined> = process.env): BotConfig {
    this.config = loadConfigFromEnv(env);
    return this.config;
  }

  validate(config: unknown): config is BotConfig {
    return validateConfig(config);
  }

  get<K extends keyof BotConfig>(key: K): BotConfig[K] {
    return this.getConfig()[key];
  }

  getConfig(): BotConfig {
    if (!this.config) {
      throw new ConfigurationError('Config not loaded. Call load() first.');
    }
    return this.config;
  }
}
