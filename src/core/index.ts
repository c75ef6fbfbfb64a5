/**
 * Core module exports
 * Contains configuration and logging
 */

export {
  type BotConfig,
  type ChatAdapterName,
  type StoreAdapterName,
  ConfigLoader,
  ConfigurationError,
  DEFAULT_BOT_NAME,
  loadConfigFromEnv,
  validateConfig,
} from './config.js';

export {
  type LogLevel,
  type LogEntry,
  type Logger,
  type LogOutput,
  LOG_LEVELS,
  LoggerImpl,
  consoleOutput,
  createLogger,
  createSilentLogger,
  formatEntry,
  isLogLevel,
  shouldLog,
} from './logger.js';
