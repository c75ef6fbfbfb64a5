/**
 * Example Module
 * A handful of commands showing each registration style
 */

import type { BotModule } from '../loader.js';
import type { HandlerFunc } from '../../commands/types.js';
import { onlyAllow } from '../../bot/guards.js';

export const UNRECOGNIZED_TEXT = 'Unrecognized command. Type `help` to see supported commands.';

const MEMORY_PREFIX = 'memory:';

const sayBye: HandlerFunc = async (state) => {
  await state.reply(`Bye ${state.message.user.name}!`);
};

const echo: HandlerFunc = async (state) => {
  await state.reply(state.message.text);
};

const showFields: HandlerFunc = async (state) => {
  for (const field of state.fields) {
    await state.reply(field);
  }
};

const thanks: HandlerFunc = async (state) => {
  await state.reply(`You're welcome ${state.message.user.name}!`);
};

const remember: HandlerFunc = async (state) => {
  const [key, ...words] = state.fields;
  if (!key || words.length === 0) {
    await state.reply('Usage: remember `key` `value`');
    return;
  }
  state.robot.store.set(MEMORY_PREFIX + key, words.join(' '));
  await state.reply(`OK, I'll remember ${key}.`);
};

const recall: HandlerFunc = async (state) => {
  const [key] = state.fields;
  if (!key) {
    const keys = Object.keys(state.robot.store.all())
      .filter(stored => stored.startsWith(MEMORY_PREFIX))
      .map(stored => stored.slice(MEMORY_PREFIX.length));
    await state.reply(keys.length > 0 ? `I remember: ${keys.join(', ')}` : 'I don\'t remember anything yet.');
    return;
  }

  const value = state.robot.store.get(MEMORY_PREFIX + key);
  await state.reply(value === undefined ? `I don't know anything about ${key}.` : `${key}: ${value}`);
};

const forget: HandlerFunc = async (state) => {
  const [key] = state.fields;
  if (!key) {
    await state.reply('Usage: forget `key`');
    return;
  }
  state.robot.store.delete(MEMORY_PREFIX + key);
  await state.reply(`Forgot ${key}.`);
};

const unrecognized: HandlerFunc = async (state) => {
  await state.reply(UNRECOGNIZED_TEXT);
};

export interface ExampleModuleOptions {
  /** User names allowed to run `forget` */
  admins?: string[];
}

export function createExampleModule(options: ExampleModuleOptions = {}): BotModule {
  const admins = options.admins ?? [];

  return {
    name: 'example',
    enabled: true,
    async setup(robot) {
      await robot.registerCommand({
        name: 'hi',
        description: 'Says goodbye when the user says hi!',
        usage: [''],
        handler: sayBye,
      });
      await robot.registerAlias('hi', 'hello');

      await robot.registerCommand({
        name: 'echo',
        description: 'Hidden `echo` command!',
        usage: ['', '`text to echo`'],
        hidden: true,
        handler: echo,
      });

      await robot.registerCommand({
        name: 'fields',
        description: 'Show the fields/parameters of a command message!',
        usage: ['`param0` `param1` `...`'],
        handler: showFields,
      });

      await robot.registerRegexpCommand('thank[s]?(\\s+you)?', {
        name: 'thanks',
        description: 'Say thank you!',
        handler: thanks,
      });

      await robot.registerCommand({
        name: 'remember',
        description: 'Remember something for later.',
        usage: ['`key` `value`'],
        handler: remember,
      });
      await robot.registerCommand({
        name: 'recall',
        description: 'Repeat something remembered earlier.',
        usage: ['', '`key`'],
        handler: recall,
      });
      await robot.registerCommand({
        name: 'forget',
        description: 'Forget something remembered earlier.',
        usage: ['`key`'],
        handler: onlyAllow(admins, forget),
      });

      await robot.setDefaultHandler(unrecognized);
    },
  };
}
