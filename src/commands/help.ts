/**
 * Built-in help command
 * Lists visible commands or describes a single one, replying through
 * the same state every other handler gets.
 */

import type { Command, CommandDefinition, HandlerFunc, RegistryView, State } from './types.js';

export const HELP_COMMAND_NAME = 'help';

export const HELP_DESCRIPTION = 'View list of commands and their usage.';

export const HELP_USAGE: readonly string[] = ['', '`command name`'];

export const NO_COMMANDS_TEXT = 'No commands have been set!';

function describe(name: string, command: Command): string {
  return command.description.length > 0 ? `*${name}* - _${command.description}_` : `*${name}*`;
}

export function renderCommandList(view: RegistryView): string {
  if (view.commandNames.length === 0) {
    return NO_COMMANDS_TEXT;
  }

  const lines: string[] = [];
  for (const name of view.commandNames) {
    const key = name.toLowerCase();
    const exact = view.findExact(name);
    if (exact && !exact.hidden) {
      lines.push(describe(exact.name, exact));
    }
    for (const command of view.regexpCommands) {
      if (command.name.toLowerCase() === key && !command.hidden) {
        lines.push(describe(command.name, command));
      }
    }
  }

  return [
    'Available commands:',
    `>>>${lines.map(line => `${line}\n`).join('')}`,
    'For help with a command, type `help [command name]`.',
  ].join('\n');
}

export function renderCommandHelp(view: RegistryView, requested: string): string {
  const name = requested.toLowerCase();
  const command = view.findExact(name) ?? view.findRegexp(name);

  if (!command) {
    return `Unrecognized command _${name}_.  Type *\`help\`* to view a list of all available commands.`;
  }

  let text = `${describe(name, command)}\n\n`;

  if (command.aliasNames.length > 0) {
    text += `Alias: _${command.aliasNames.join(', ')}_\n`;
  }

  if (command.usage.length > 0) {
    text += '>>>';
    for (const use of command.usage) {
      text += use.length > 0 ? `${name} ${use}\n` : `${name}\n`;
    }
  }

  return text;
}

/**
 * Creates the help handler bound to a registry view. The dispatcher
 * holds the registry read lock while it runs.
 */
export function createHelpHandler(view: RegistryView): HandlerFunc {
  return async (state: State) => {
    const text = state.fields.length === 0
      ? renderCommandList(view)
      : renderCommandHelp(view, state.fields[0]);
    await state.reply(text);
  };
}

export function createHelpCommand(view: RegistryView): CommandDefinition {
  return {
    name: HELP_COMMAND_NAME,
    description: HELP_DESCRIPTION,
    usage: [...HELP_USAGE],
    handler: createHelpHandler(view),
  };
}
