/**
 * Dispatcher
 * Routes one inbound message to at most one handler
 */

import type { Message } from '../chat/types.js';
import type { CommandRegistry } from '../commands/registry.js';
import { tokenize } from '../commands/tokenizer.js';
import { createState, type HandlerFunc, type RegistryView, type RobotContext } from '../commands/types.js';
import { type Logger, createSilentLogger } from '../core/logger.js';
import { type ErrorContext, type ErrorHandler, toError } from '../services/error-handler.js';
import { createBotNamePattern, detectAddressing } from './addressing.js';

/**
 * What happened to a message
 * - command: an exact-name command ran
 * - regexp: a regexp command ran
 * - default: the default handler ran
 * - pattern: a free pattern handler ran
 * - unhandled: addressed, but nothing matched and no default handler is set
 * - ignored: not addressed and no free pattern matched
 */
export type DispatchOutcome = 'command' | 'regexp' | 'default' | 'pattern' | 'unhandled' | 'ignored';

export interface DispatcherOptions {
  robot: RobotContext;
  registry: CommandRegistry;
  errorHandler: ErrorHandler;
  logger?: Logger;
}

export class Dispatcher {
  private readonly robot: RobotContext;
  private readonly registry: CommandRegistry;
  private readonly errorHandler: ErrorHandler;
  private readonly logger: Logger;
  private readonly botNamePattern: RegExp;

  constructor(options: DispatcherOptions) {
    this.robot = options.robot;
    this.registry = options.registry;
    this.errorHandler = options.errorHandler;
    this.logger = options.logger ?? createSilentLogger();
    this.botNamePattern = createBotNamePattern(options.robot.name);
  }

  /**
   * Finds a match for the message and runs its handler, holding the
   * registry read lock throughout. Handler failures are logged and
   * never reach the caller.
   */
  async processMessage(message: Message): Promise<DispatchOutcome> {
    try {
      return await this.registry.read(view => this.dispatch(view, message));
    } catch (error) {
      this.logger.error('Unexpected failure processing message', toError(error), { text: message.text });
      return 'unhandled';
    }
  }

  private async dispatch(view: RegistryView, message: Message): Promise<DispatchOutcome> {
    const addressing = detectAddressing(this.botNamePattern, message);

    if (!addressing.addressed) {
      return this.matchPatterns(view, message);
    }

    const fields = tokenize(addressing.text);
    const matched = await this.matchCommands(view, message, fields);
    if (matched) {
      return matched;
    }

    // The default handler sees the command word as its first field
    return this.callDefault(view, message, fields);
  }

  private async matchCommands(
    view: RegistryView,
    message: Message,
    fields: string[]
  ): Promise<'command' | 'regexp' | null> {
    if (fields.length === 0) {
      return null;
    }

    const commandName = fields[0].toLowerCase();
    const args = fields.slice(1);

    const command = view.findExact(commandName);
    if (command && command.kind === 'exact') {
      await this.invoke(command.handler, message, args);
      return 'command';
    }

    const regexpCommand = view.findRegexp(commandName);
    if (regexpCommand) {
      await this.invoke(regexpCommand.handler, message, args);
      return 'regexp';
    }

    return null;
  }

  private async callDefault(view: RegistryView, message: Message, fields: string[]): Promise<DispatchOutcome> {
    const handler = view.defaultHandler;
    if (!handler) {
      this.logger.info('Default handler invoked but none is set.', { text: message.text });
      return 'unhandled';
    }

    await this.invoke(handler, message, fields);
    return 'default';
  }

  private async matchPatterns(view: RegistryView, message: Message): Promise<DispatchOutcome> {
    const entry = view.findPattern(message.text);
    if (!entry) {
      return 'ignored';
    }

    await this.invoke(entry.handler, message, []);
    return 'pattern';
  }

  private async invoke(handler: HandlerFunc, message: Message, fields: readonly string[]): Promise<void> {
    try {
      await handler(createState(this.robot, message, fields));
    } catch (error) {
      this.errorHandler.handle(toError(error), errorContextFor(message));
    }
  }
}

export function errorContextFor(message: Message): ErrorContext {
  return {
    text: message.text,
    userId: message.user.id,
    channelId: message.channel.id,
  };
}

export function createDispatcher(options: DispatcherOptions): Dispatcher {
  return new Dispatcher(options);
}
