/**
 * Addressing
 * Decides whether a message is directed at the bot
 */

import type { Message } from '../chat/types.js';

export interface Addressing {
  /** Prefix mention matched or the message arrived in a direct channel */
  addressed: boolean;
  /** The matched mention prefix, empty when there was none */
  prefix: string;
  /** Message text with the mention prefix removed */
  text: string;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Builds the mention prefix pattern for a bot name: an optional `@`,
 * the name (case-insensitive) not followed by a letter, digit or `_`
 * in any script, then an optional `:` or `,` and any surrounding
 * whitespace.
 */
export function createBotNamePattern(botName: string): RegExp {
  return new RegExp(`^@?${escapeRegExp(botName)}(?![\\p{L}\\p{N}_])\\s*[:,]?\\s*`, 'iu');
}

export function detectAddressing(botNamePattern: RegExp, message: Message): Addressing {
  const prefix = botNamePattern.exec(message.text)?.[0] ?? '';

  return {
    addressed: prefix.length > 0 || message.isDirect,
    prefix,
    text: message.text.slice(prefix.length),
  };
}
