/**
 * Commands module exports
 * Command model, registry, tokenizer and the built-in help command
 */

export {
  type Command,
  type CommandDefinition,
  type ExactCommand,
  type HandlerFunc,
  type PatternHandler,
  type RegexpCommand,
  type RegistryView,
  type RobotContext,
  type State,
  createState,
} from './types.js';

export {
  type CommandRegistry,
  type CommandRegistryOptions,
  CommandRegistrationError,
  CommandRegistryImpl,
  createCommandRegistry,
} from './registry.js';

export { tokenize } from './tokenizer.js';
export { compilePattern, PatternSyntaxError } from './patterns.js';

export {
  HELP_COMMAND_NAME,
  HELP_DESCRIPTION,
  HELP_USAGE,
  NO_COMMANDS_TEXT,
  renderCommandList,
  renderCommandHelp,
  createHelpCommand,
} from './help.js';
