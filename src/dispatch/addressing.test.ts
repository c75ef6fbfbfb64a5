/**
 * Tests for bot name addressing
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { createBotNamePattern, detectAddressing } from './addressing.js';
import { createMessage } from '../chat/types.js';

const pattern = createBotNamePattern('bot');

const channelMessage = (text: string) => createMessage({ text, isDirect: false });

describe('createBotNamePattern / detectAddressing', () => {
  it.each(['@bot: hi', '@bot, hi', 'bot hi', 'BOT hi', '@Bot:hi', 'bot,   hi'])(
    'should strip the mention from "%s"',
    (text) => {
      const result = detectAddressing(pattern, channelMessage(text));

      expect(result.addressed).toBe(true);
      expect(result.text).toBe('hi');
    }
  );

  it('should report the matched prefix', () => {
    expect(detectAddressing(pattern, channelMessage('@bot: hi')).prefix).toBe('@bot: ');
  });

  it('should not match the name inside a longer word', () => {
    const result = detectAddressing(pattern, channelMessage('robot hi'));

    expect(result.addressed).toBe(false);
    expect(result.prefix).toBe('');
    expect(result.text).toBe('robot hi');
  });

  it('should not match the name followed by more word characters', () => {
    expect(detectAddressing(pattern, channelMessage('bots are fun')).addressed).toBe(false);
    expect(detectAddressing(pattern, channelMessage('bot_helper hi')).addressed).toBe(false);
  });

  it('should not match the name followed by letters or digits outside ASCII', () => {
    expect(detectAddressing(pattern, channelMessage('boté hi')).addressed).toBe(false);
    expect(detectAddressing(pattern, channelMessage('bot\u0663 hi')).addressed).toBe(false);

    const cyrillic = createBotNamePattern('бот');
    expect(detectAddressing(cyrillic, channelMessage('ботинок привет')).addressed).toBe(false);
    expect(detectAddressing(cyrillic, channelMessage('бот, привет')).text).toBe('привет');
    expect(detectAddressing(cyrillic, channelMessage('@БОТ: привет')).text).toBe('привет');
  });

  it('should only match the name at the start of the text', () => {
    expect(detectAddressing(pattern, channelMessage('hey bot')).addressed).toBe(false);
  });

  it('should treat direct messages as addressed without changing the text', () => {
    const result = detectAddressing(pattern, createMessage({ text: 'echo hi', isDirect: true }));

    expect(result).toEqual({ addressed: true, prefix: '', text: 'echo hi' });
  });

  it('should strip the mention in direct messages too', () => {
    const result = detectAddressing(pattern, createMessage({ text: '@bot echo hi', isDirect: true }));

    expect(result.text).toBe('echo hi');
  });

  it('should address a bare mention with nothing left over', () => {
    expect(detectAddressing(pattern, channelMessage('@bot'))).toEqual({
      addressed: true,
      prefix: '@bot',
      text: '',
    });
  });

  it('should escape regular expression characters in the name', () => {
    const dotted = createBotNamePattern('r.2');

    expect(detectAddressing(dotted, channelMessage('r.2 hi')).text).toBe('hi');
    expect(detectAddressing(dotted, channelMessage('rx2 hi')).addressed).toBe(false);
  });

  it('should leave the remaining text a suffix of the original', () => {
    fc.assert(
      fc.property(fc.string(), fc.boolean(), (text, isDirect) => {
        const result = detectAddressing(pattern, createMessage({ text, isDirect }));

        expect(result.prefix + result.text).toBe(text);
        expect(result.addressed).toBe(isDirect || result.prefix.length > 0);
      }),
      { numRuns: 200 }
    );
  });
});
