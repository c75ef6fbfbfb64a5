/**
 * Drops messages the bot sent itself
 */

import type { MiddlewareDefinition } from './pipeline.js';

export const IGNORE_SELF_MIDDLEWARE = 'ignore-self';

export function isOwnMessage(botName: string, senderName: string): boolean {
  return senderName.toLowerCase() === botName.toLowerCase();
}

export const ignoreSelfMiddleware: MiddlewareDefinition = {
  name: IGNORE_SELF_MIDDLEWARE,
  priority: 0,
  handler: async (ctx, next) => {
    if (isOwnMessage(ctx.botName, ctx.message.user.name)) {
      return;
    }
    await next();
  },
};
