/**
 * Tests for the built-in help command
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { createCommandRegistry, type CommandRegistry } from './registry.js';
import { NO_COMMANDS_TEXT, renderCommandHelp, renderCommandList } from './help.js';
import { Dispatcher } from '../dispatch/dispatcher.js';
import { MockChatAdapter } from '../chat/mock-adapter.js';
import { createMessage } from '../chat/types.js';
import { MemoryStore } from '../store/memory.js';
import { createErrorHandler } from '../services/error-handler.js';
import { createSilentLogger } from '../core/logger.js';

const FOOTER = 'For help with a command, type `help [command name]`.';

describe('Help command', () => {
  let chat: MockChatAdapter;
  let registry: CommandRegistry;
  let dispatcher: Dispatcher;

  const ask = async (text: string): Promise<string[]> => {
    chat.clear();
    await dispatcher.processMessage(createMessage({ text, isDirect: true }));
    return chat.sentTexts();
  };

  beforeEach(async () => {
    chat = new MockChatAdapter();
    registry = createCommandRegistry();
    dispatcher = new Dispatcher({
      robot: { name: 'bot', chat, store: new MemoryStore() },
      registry,
      errorHandler: createErrorHandler(createSilentLogger()),
    });

    await registry.registerCommand({
      name: 'hi',
      description: 'Says hi',
      usage: ['', '`name`'],
      handler: () => {},
    });
    await registry.registerAlias('hi', 'hello');
    await registry.registerCommand({ name: 'echo', hidden: true, handler: () => {} });
    await registry.registerRegexpCommand('thank[s]?', { name: 'thanks', description: 'Be polite', handler: () => {} });
    await registry.enableHelp();
  });

  it('should list visible commands in name order', async () => {
    expect(await ask('help')).toEqual([
      'Available commands:\n' +
        '>>>*help* - _View list of commands and their usage._\n' +
        '*hi* - _Says hi_\n' +
        '*thanks* - _Be polite_\n' +
        '\n' +
        FOOTER,
    ]);
  });

  it('should list mixed-case names alphabetically under their latest spelling', async () => {
    await registry.registerCommand({ name: 'Zeta', description: 'Last letter', handler: () => {} });
    await registry.registerCommand({ name: 'alpha', description: 'First letter', handler: () => {} });
    await registry.registerCommand({ name: 'HI', description: 'Says hi loudly', handler: () => {} });

    expect(await ask('help')).toEqual([
      'Available commands:\n' +
        '>>>*alpha* - _First letter_\n' +
        '*help* - _View list of commands and their usage._\n' +
        '*HI* - _Says hi loudly_\n' +
        '*thanks* - _Be polite_\n' +
        '*Zeta* - _Last letter_\n' +
        '\n' +
        FOOTER,
    ]);
  });

  it('should describe one command with its aliases and usage', async () => {
    expect(await ask('help HI')).toEqual(['*hi* - _Says hi_\n\nAlias: _hello_\n>>>hi\nhi `name`\n']);
  });

  it('should describe an alias under its own name', async () => {
    expect(await ask('help hello')).toEqual(['*hello* - _Says hi_\n\n>>>hello\nhello `name`\n']);
  });

  it('should describe hidden commands', async () => {
    expect(await ask('help echo')).toEqual(['*echo*\n\n']);
  });

  it('should describe regexp commands by their name', async () => {
    expect(await ask('help thanks')).toEqual(['*thanks* - _Be polite_\n\n']);
  });

  it('should describe itself', async () => {
    expect(await ask('help help')).toEqual([
      '*help* - _View list of commands and their usage._\n\n>>>help\nhelp `command name`\n',
    ]);
  });

  it('should only look at the first argument', async () => {
    expect(await ask('help echo hi')).toEqual(['*echo*\n\n']);
  });

  it('should point unknown names back to the listing', async () => {
    expect(await ask('help Nope')).toEqual([
      'Unrecognized command _nope_.  Type *`help`* to view a list of all available commands.',
    ]);
  });

  it('should report an empty registry', async () => {
    const empty = createCommandRegistry();
    expect(await empty.read(view => renderCommandList(view))).toBe(NO_COMMANDS_TEXT);
    expect(await empty.read(view => renderCommandHelp(view, 'x'))).toBe(
      'Unrecognized command _x_.  Type *`help`* to view a list of all available commands.'
    );
  });
});
