/**
 * Error Handler
 * Logs handler and adapter failures with the message they happened on
 * and notifies registered callbacks. Never rethrows.
 */

import { type Logger, createLogger } from '../core/logger.js';

/**
 * Where the failure happened; all fields optional since adapter errors
 * have no message attached
 */
export interface ErrorContext {
  text?: string;
  userId?: string;
  channelId?: string;
  [key: string]: unknown;
}

export type ErrorCallback = (error: Error, ctx: ErrorContext) => void;

export interface ErrorHandler {
  handle(error: Error, ctx: ErrorContext): void;
  onError(callback: ErrorCallback): void;
  getLastLoggedError(): ErrorLogEntry | null;
}

export interface ErrorLogEntry {
  errorMessage: string;
  stackTrace: string | undefined;
  text: string | undefined;
  userId: string | undefined;
  channelId: string | undefined;
  timestamp: Date;
}

/**
 * Normalizes anything thrown into an Error
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  if (typeof value === 'string') {
    return new Error(value);
  }
  try {
    return new Error(JSON.stringify(value) ?? String(value));
  } catch {
    return new Error(String(value));
  }
}

export class ErrorHandlerImpl implements ErrorHandler {
  private readonly logger: Logger;
  private readonly callbacks: ErrorCallback[] = [];
  private lastLoggedError: ErrorLogEntry | null = null;

  constructor(logger?: Logger) {
    this.logger = logger ?? createLogger('error');
  }

  handle(error: Error, ctx: ErrorContext): void {
    this.lastLoggedError = {
      errorMessage: error.message,
      stackTrace: error.stack,
      text: ctx.text,
      userId: ctx.userId,
      channelId: ctx.channelId,
      timestamp: new Date(),
    };

    this.logger.error('Handler error occurred', error, { ...ctx });

    for (const callback of this.callbacks) {
      try {
        callback(error, ctx);
      } catch (callbackError) {
        this.logger.warn('Error callback threw an exception', {
          callbackError: toError(callbackError).message,
        });
      }
    }
  }

  onError(callback: ErrorCallback): void {
    this.callbacks.push(callback);
  }

  /**
   * Last logged error entry, for inspection in tests
   */
  getLastLoggedError(): ErrorLogEntry | null {
    return this.lastLoggedError;
  }
}

export function createErrorHandler(logger?: Logger): ErrorHandler {
  return new ErrorHandlerImpl(logger);
}
