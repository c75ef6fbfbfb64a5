/**
 * Command Registry
 * Exact-name commands, ordered regexp commands, aliases, free patterns
 * and the default handler, guarded by a single read/write lock.
 */

import { type Logger, createSilentLogger } from '../core/logger.js';
import { ReadWriteLock } from '../dispatch/rw-lock.js';
import { compilePattern, PatternSyntaxError } from './patterns.js';
import { insertSorted, insertSortedName } from './sorted-names.js';
import { createHelpCommand, HELP_COMMAND_NAME } from './help.js';
import type {
  Command,
  CommandDefinition,
  ExactCommand,
  HandlerFunc,
  PatternHandler,
  RegexpCommand,
  RegistryView,
} from './types.js';

/**
 * Command registry interface
 * Every mutation holds the write lock for its whole duration.
 */
export interface CommandRegistry {
  registerCommand(definition: CommandDefinition): Promise<void>;
  registerRegexpCommand(pattern: RegExp | string, definition: CommandDefinition): Promise<void>;
  registerAlias(originalName: string, aliasName: string): Promise<void>;
  registerAliasRegexp(originalName: string, aliasName: string, pattern: RegExp | string): Promise<void>;
  setDefaultHandler(handler: HandlerFunc): Promise<void>;
  registerPattern(pattern: RegExp | string, handler: HandlerFunc): Promise<void>;
  enableHelp(): Promise<void>;
  /** Independent copy of the exact-name table keyed by lower-cased name */
  snapshotCommands(): Promise<Map<string, Command>>;
  commandNames(): Promise<string[]>;
  hasCommand(name: string): Promise<boolean>;
  /** Runs fn with read access to the registry under the read lock */
  read<T>(fn: (view: RegistryView) => T | Promise<T>): Promise<T>;
}

/**
 * Raised for registration mistakes that must stop setup, such as a
 * regexp command whose pattern does not compile
 */
export class CommandRegistrationError extends Error {
  constructor(message: string, cause?: Error) {
    super(message, { cause });
    this.name = 'CommandRegistrationError';
  }
}

export interface CommandRegistryOptions {
  logger?: Logger;
}

function cloneCommand(command: Command): Command {
  return {
    ...command,
    usage: [...command.usage],
    aliasNames: [...command.aliasNames],
  };
}

export class CommandRegistryImpl implements CommandRegistry {
  private readonly lock = new ReadWriteLock();
  private readonly logger: Logger;
  private readonly commands = new Map<string, Command>();
  private readonly regexpCommands: RegexpCommand[] = [];
  private readonly patterns: PatternHandler[] = [];
  private readonly names: string[] = [];
  private defaultHandler: HandlerFunc | undefined;

  /**
   * Unlocked view over the live tables, handed out only under the read lock
   */
  private readonly view: RegistryView;

  constructor(options: CommandRegistryOptions = {}) {
    this.logger = options.logger ?? createSilentLogger();

    const commands = this.commands;
    const regexpCommands = this.regexpCommands;
    const patterns = this.patterns;
    const names = this.names;
    const getDefault = () => this.defaultHandler;

    this.view = {
      commandNames: names,
      regexpCommands,
      get defaultHandler() {
        return getDefault();
      },
      findExact: (name) => commands.get(name.toLowerCase()),
      findRegexp: (word) => regexpCommands.find(command => command.pattern.test(word)),
      findPattern: (text) => patterns.find(entry => entry.pattern.test(text)),
    };
  }

  registerCommand(definition: CommandDefinition): Promise<void> {
    return this.lock.withWrite(() => {
      this.addExact(definition, false);
    });
  }

  registerRegexpCommand(pattern: RegExp | string, definition: CommandDefinition): Promise<void> {
    return this.lock.withWrite(() => {
      let compiled: RegExp;
      try {
        compiled = compilePattern(pattern);
      } catch (error) {
        const cause = error instanceof Error ? error : undefined;
        throw new CommandRegistrationError(
          `Cannot add invalid regular expression command under name "${definition.name.toLowerCase()}"`,
          cause
        );
      }
      this.addRegexp(compiled, definition, false);
    });
  }

  registerAlias(originalName: string, aliasName: string): Promise<void> {
    return this.lock.withWrite(() => {
      const lowerOriginal = originalName.toLowerCase();
      const original = this.commands.get(lowerOriginal);

      if (!original) {
        this.logger.warn(`Cannot add alias for unset command "${lowerOriginal}"`);
        return;
      }
      if (lowerOriginal === aliasName.toLowerCase()) {
        this.logger.warn(`A command cannot alias itself (command ${lowerOriginal})`);
        return;
      }
      if (!insertSorted(original.aliasNames, aliasName)) {
        this.logger.warn(`Alias "${aliasName}" for original command "${lowerOriginal}" already exists`);
        return;
      }

      this.addExact(this.aliasDefinition(original, aliasName), true);
    });
  }

  registerAliasRegexp(originalName: string, aliasName: string, pattern: RegExp | string): Promise<void> {
    return this.lock.withWrite(() => {
      let compiled: RegExp;
      try {
        compiled = compilePattern(pattern);
      } catch (error) {
        this.logger.warn('Cannot add invalid regular expression alias', {
          original: originalName.toLowerCase(),
          alias: aliasName,
          reason: error instanceof PatternSyntaxError ? error.message : String(error),
        });
        return;
      }

      const lowerOriginal = originalName.toLowerCase();
      const original = this.commands.get(lowerOriginal);
      if (!original) {
        this.logger.warn(`Cannot add alias for unset command "${lowerOriginal}"`);
        return;
      }

      if (aliasName.length > 0 && !insertSorted(original.aliasNames, aliasName)) {
        this.logger.warn(
          `Alias "${aliasName}" for original command "${lowerOriginal}" already exists - regexp was still added`
        );
      }

      this.addRegexp(compiled, this.aliasDefinition(original, aliasName), true);
    });
  }

  setDefaultHandler(handler: HandlerFunc): Promise<void> {
    return this.lock.withWrite(() => {
      if (this.defaultHandler) {
        this.logger.warn('Default handler has been set more than once.');
      }
      this.defaultHandler = handler;
    });
  }

  registerPattern(pattern: RegExp | string, handler: HandlerFunc): Promise<void> {
    return this.lock.withWrite(() => {
      let compiled: RegExp;
      try {
        compiled = compilePattern(pattern);
      } catch (error) {
        this.logger.warn('Cannot add invalid regular expression pattern', {
          reason: error instanceof PatternSyntaxError ? error.message : String(error),
        });
        return;
      }
      this.patterns.push({ pattern: compiled, handler });
    });
  }

  enableHelp(): Promise<void> {
    return this.lock.withWrite(() => {
      if (this.commands.has(HELP_COMMAND_NAME)) {
        this.logger.warn('Enabling built in help command and overriding set help command.');
      }
      this.addExact(createHelpCommand(this.view), false);
    });
  }

  snapshotCommands(): Promise<Map<string, Command>> {
    return this.lock.withRead(() => {
      const copy = new Map<string, Command>();
      for (const [key, command] of this.commands) {
        copy.set(key, cloneCommand(command));
      }
      return copy;
    });
  }

  commandNames(): Promise<string[]> {
    return this.lock.withRead(() => [...this.names]);
  }

  hasCommand(name: string): Promise<boolean> {
    return this.lock.withRead(() => {
      const lower = name.toLowerCase();
      return this.names.some(existing => existing.toLowerCase() === lower);
    });
  }

  read<T>(fn: (view: RegistryView) => T | Promise<T>): Promise<T> {
    return this.lock.withRead(() => fn(this.view));
  }

  private aliasDefinition(original: Command, aliasName: string): CommandDefinition {
    return {
      name: aliasName,
      hidden: true,
      handler: original.handler,
      description: original.description,
      usage: [...original.usage],
    };
  }

  // Callers hold the write lock
  private addExact(definition: CommandDefinition, isAlias: boolean): void {
    const key = definition.name.toLowerCase();
    if (this.commands.has(key)) {
      this.logger.warn(`"${key}" has been set more than once.`);
    }

    const command: ExactCommand = {
      kind: 'exact',
      name: definition.name,
      description: definition.description ?? '',
      usage: [...(definition.usage ?? [])],
      hidden: definition.hidden ?? false,
      isAlias,
      aliasNames: [],
      handler: definition.handler,
    };

    this.commands.set(key, command);
    insertSortedName(this.names, definition.name);
    this.logger.debug(`Registered command: ${definition.name}`, { hidden: command.hidden, isAlias });
  }

  // Callers hold the write lock
  private addRegexp(pattern: RegExp, definition: CommandDefinition, isAlias: boolean): void {
    const command: RegexpCommand = {
      kind: 'regexp',
      name: definition.name,
      description: definition.description ?? '',
      usage: [...(definition.usage ?? [])],
      hidden: definition.hidden ?? false,
      isAlias,
      aliasNames: [],
      handler: definition.handler,
      pattern,
    };

    this.regexpCommands.push(command);
    if (definition.name.length > 0) {
      insertSortedName(this.names, definition.name);
    }
    this.logger.debug(`Registered regexp command: ${definition.name}`, { pattern: String(pattern), isAlias });
  }
}

/**
 * Factory function to create a new command registry
 */
export function createCommandRegistry(options: CommandRegistryOptions = {}): CommandRegistry {
  return new CommandRegistryImpl(options);
}
