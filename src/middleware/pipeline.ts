/**
 * Middleware Pipeline
 * Priority-ordered steps every received message passes through before
 * it reaches the dispatcher
 */

import type { Message } from '../chat/types.js';

/**
 * Context threaded through the pipeline for one message
 */
export interface MessageContext {
  readonly message: Message;
  readonly botName: string;
  /** Name of the middleware that stopped the chain, if any */
  droppedBy?: string;
}

export type NextFunction = () => Promise<void>;

export type MiddlewareHandler<T extends MessageContext = MessageContext> = (
  ctx: T,
  next: NextFunction
) => Promise<void>;

export interface MiddlewareDefinition<T extends MessageContext = MessageContext> {
  name: string;
  /** Lower runs first; equal priorities keep registration order */
  priority: number;
  handler: MiddlewareHandler<T>;
}

export interface MiddlewarePipeline<T extends MessageContext = MessageContext> {
  use(middleware: MiddlewareDefinition<T>): void;
  remove(name: string): void;
  /**
   * Runs the chain, then terminal once the last middleware calls next().
   * Resolves false when a middleware stopped the chain.
   */
  execute(ctx: T, terminal?: (ctx: T) => Promise<void>): Promise<boolean>;
  getOrderedMiddlewares(): MiddlewareDefinition<T>[];
}

export class MiddlewarePipelineImpl<T extends MessageContext = MessageContext>
  implements MiddlewarePipeline<T>
{
  private middlewares: Map<string, MiddlewareDefinition<T>> = new Map();

  /**
   * Registers a middleware, replacing any with the same name
   */
  use(middleware: MiddlewareDefinition<T>): void {
    this.middlewares.delete(middleware.name);
    this.middlewares.set(middleware.name, middleware);
  }

  remove(name: string): void {
    this.middlewares.delete(name);
  }

  getOrderedMiddlewares(): MiddlewareDefinition<T>[] {
    return Array.from(this.middlewares.values()).sort((a, b) => a.priority - b.priority);
  }

  async execute(ctx: T, terminal?: (ctx: T) => Promise<void>): Promise<boolean> {
    const ordered = this.getOrderedMiddlewares();
    let index = 0;
    let completed = false;

    const runNext = async (): Promise<void> => {
      if (index >= ordered.length) {
        completed = true;
        if (terminal) {
          await terminal(ctx);
        }
        return;
      }

      const current = ordered[index];
      index++;

      await current.handler(ctx, runNext);
      if (!completed && ctx.droppedBy === undefined) {
        ctx.droppedBy = current.name;
      }
    };

    await runNext();
    return completed;
  }
}

export function createMiddlewarePipeline<T extends MessageContext = MessageContext>(): MiddlewarePipeline<T> {
  return new MiddlewarePipelineImpl<T>();
}
