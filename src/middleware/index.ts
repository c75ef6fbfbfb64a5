/**
 * Middleware exports
 * Pipeline run on every received message, and the built-in middlewares
 */

export {
  type MessageContext,
  type NextFunction,
  type MiddlewareHandler,
  type MiddlewareDefinition,
  type MiddlewarePipeline,
  MiddlewarePipelineImpl,
  createMiddlewarePipeline,
} from './pipeline.js';

export { IGNORE_SELF_MIDDLEWARE, ignoreSelfMiddleware, isOwnMessage } from './ignore-self.js';
