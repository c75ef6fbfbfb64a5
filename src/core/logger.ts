/**
 * Logger System
 * Leveled logging with scoped child loggers and pluggable output
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  scope?: string;
  context?: Record<string, unknown>;
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
  /** Logger sharing level and output whose entries carry the given scope */
  child(scope: string): Logger;
  setLevel(level: LogLevel): void;
  getLevel(): LogLevel;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

export function shouldLog(entryLevel: LogLevel, configuredLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[entryLevel] >= LOG_LEVEL_PRIORITY[configuredLevel];
}

export type LogOutput = (entry: LogEntry) => void;

/**
 * Renders an entry as a single line:
 * `[2024-01-01T00:00:00.000Z] [WARN] [registry] message {"key":"value"}`
 */
export function formatEntry(entry: LogEntry): string {
  const timestamp = entry.timestamp.toISOString();
  const scopeStr = entry.scope ? ` [${entry.scope}]` : '';
  const contextStr = entry.context ? ` ${JSON.stringify(entry.context)}` : '';
  return `[${timestamp}] [${entry.level.toUpperCase()}]${scopeStr} ${entry.message}${contextStr}`;
}

export const consoleOutput: LogOutput = (entry: LogEntry) => {
  const line = formatEntry(entry);

  switch (entry.level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.info(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line);
      break;
  }
};

/**
 * Level is held in a shared box so that setLevel on a parent
 * also applies to every child created from it.
 */
interface LevelBox {
  level: LogLevel;
}

export class LoggerImpl implements Logger {
  private readonly levelBox: LevelBox;
  private readonly output: LogOutput;
  private readonly scope?: string;

  constructor(level: LogLevel = 'info', output: LogOutput = consoleOutput, scope?: string, levelBox?: LevelBox) {
    this.levelBox = levelBox ?? { level };
    this.output = output;
    this.scope = scope;
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (!shouldLog(level, this.levelBox.level)) {
      return;
    }

    this.output({
      level,
      message,
      timestamp: new Date(),
      scope: this.scope,
      context,
    });
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    const errorContext: Record<string, unknown> = {
      ...context,
    };

    if (error) {
      errorContext.errorMessage = error.message;
      errorContext.errorStack = error.stack;
    }

    this.log('error', message, Object.keys(errorContext).length > 0 ? errorContext : undefined);
  }

  child(scope: string): Logger {
    const childScope = this.scope ? `${this.scope}:${scope}` : scope;
    return new LoggerImpl(this.levelBox.level, this.output, childScope, this.levelBox);
  }

  setLevel(level: LogLevel): void {
    this.levelBox.level = level;
  }

  getLevel(): LogLevel {
    return this.levelBox.level;
  }
}

export function createLogger(level: LogLevel = 'info', output?: LogOutput): Logger {
  return new LoggerImpl(level, output);
}

/**
 * Logger that drops everything, for collaborators constructed without one
 */
export function createSilentLogger(): Logger {
  return new LoggerImpl('error', () => {});
}
