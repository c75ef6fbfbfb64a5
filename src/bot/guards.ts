/**
 * Handler guards
 */

import type { HandlerFunc } from '../commands/types.js';

export function deniedText(userName: string): string {
  return `Sorry, ${userName}. I can't let you do that.`;
}

/**
 * Runs handler only for the listed user names (exact match); anyone
 * else gets a refusal in the channel
 */
export function onlyAllow(userNames: readonly string[], handler: HandlerFunc): HandlerFunc {
  return async (state) => {
    const actual = state.message.user.name;
    if (userNames.includes(actual)) {
      await handler(state);
      return;
    }
    await state.reply(deniedText(actual));
  };
}
