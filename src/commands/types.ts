/**
 * Command model
 * Handlers, per-invocation state and the command variants held by the registry
 */

import type { ChatAdapter, Message } from '../chat/types.js';
import type { StoreAdapter } from '../store/types.js';

/**
 * What a handler can reach of the robot that dispatched to it
 */
export interface RobotContext {
  readonly name: string;
  readonly chat: ChatAdapter;
  readonly store: StoreAdapter;
}

/**
 * Built fresh for every handler call and discarded afterwards
 */
export interface State {
  readonly robot: RobotContext;
  readonly chat: ChatAdapter;
  readonly message: Message;
  /** Arguments parsed from the message text */
  readonly fields: readonly string[];
  /** Sends text to the channel the message came from */
  reply(text: string): Promise<void>;
}

export type HandlerFunc = (state: State) => void | Promise<void>;

export interface CommandDefinition {
  name: string;
  handler: HandlerFunc;
  description?: string;
  /** Suffixes rendered after the command name by the help command */
  usage?: string[];
  /** Left out of the help listing but still invokable and describable */
  hidden?: boolean;
}

interface CommandBase {
  /** Display name, case preserved */
  name: string;
  description: string;
  usage: readonly string[];
  hidden: boolean;
  isAlias: boolean;
  /** Sorted, duplicate-free, case-sensitive; only used for help text */
  aliasNames: string[];
  handler: HandlerFunc;
}

export interface ExactCommand extends CommandBase {
  kind: 'exact';
}

export interface RegexpCommand extends CommandBase {
  kind: 'regexp';
  /** Matched against the first word of an addressed message */
  pattern: RegExp;
}

export type Command = ExactCommand | RegexpCommand;

/**
 * Matched against the full text of messages not addressed to the bot
 */
export interface PatternHandler {
  pattern: RegExp;
  handler: HandlerFunc;
}

/**
 * Read access to the registry contents. Only valid while the
 * registry's read lock is held.
 */
export interface RegistryView {
  /**
   * Display names of every registered command, sorted and unique without
   * regard to case. Each holds the spelling of its latest registration.
   */
  readonly commandNames: readonly string[];
  /** Regexp commands in registration order */
  readonly regexpCommands: readonly RegexpCommand[];
  readonly defaultHandler: HandlerFunc | undefined;
  /** Case-insensitive lookup in the exact-name table */
  findExact(name: string): Command | undefined;
  /** First regexp command, in registration order, whose pattern matches the word */
  findRegexp(word: string): RegexpCommand | undefined;
  /** First free pattern, in registration order, matching the text */
  findPattern(text: string): PatternHandler | undefined;
}

export function createState(robot: RobotContext, message: Message, fields: readonly string[]): State {
  return {
    robot,
    chat: robot.chat,
    message,
    fields,
    reply: (text: string) => robot.chat.send(message.channel.id, text),
  };
}
