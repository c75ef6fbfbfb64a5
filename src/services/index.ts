/**
 * Services exports
 */

export {
  type ErrorCallback,
  type ErrorContext,
  type ErrorHandler,
  type ErrorLogEntry,
  ErrorHandlerImpl,
  createErrorHandler,
  toError,
} from './error-handler.js';
