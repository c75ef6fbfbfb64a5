/**
 * Chat adapter contract
 * Messages, users and channels as seen by the robot, plus the
 * outbound capabilities every transport provides.
 */

import type { ErrorContext } from '../services/error-handler.js';

export interface ChatUser {
  id: string;
  name: string;
  email?: string;
  isBot: boolean;
}

export interface ChatChannel {
  id: string;
  name: string;
}

export interface Message {
  text: string;
  user: ChatUser;
  channel: ChatChannel;
  /** True for private/direct conversations with the bot */
  isDirect: boolean;
  archiveLink?: string;
  timestamp: string;
}

export interface ChatAdapter {
  /** Stable for as long as the adapter points at the same chat instance */
  readonly id: string;
  /** Name of the team or chat instance */
  readonly name: string;
  run(): Promise<void>;
  stop(): Promise<void>;
  send(channelId: string, text: string): Promise<void>;
  sendDirectMessage(userId: string, text: string): Promise<void>;
}

/**
 * The part of the robot an adapter talks back to
 */
export interface ChatRobot {
  readonly name: string;
  receive(message: Message): Promise<void>;
  reportError(error: Error, context?: ErrorContext): void;
}

export type ChatAdapterFactory = (robot: ChatRobot) => ChatAdapter;

export interface MessageInit {
  text: string;
  user?: ChatUser;
  channel?: ChatChannel;
  isDirect?: boolean;
  archiveLink?: string;
  timestamp?: string;
}

const ANONYMOUS_USER: ChatUser = {
  id: 'unknown',
  name: 'unknown',
  isBot: false,
};

const UNKNOWN_CHANNEL: ChatChannel = {
  id: 'unknown',
  name: 'unknown',
};

/**
 * Builds a Message, filling unset fields with placeholders
 */
export function createMessage(init: MessageInit): Message {
  return {
    text: init.text,
    user: init.user ?? ANONYMOUS_USER,
    channel: init.channel ?? UNKNOWN_CHANNEL,
    isDirect: init.isDirect ?? false,
    archiveLink: init.archiveLink,
    timestamp: init.timestamp ?? new Date().toISOString(),
  };
}
