/**
 * Chat adapter exports
 */

export {
  type ChatAdapter,
  type ChatAdapterFactory,
  type ChatChannel,
  type ChatRobot,
  type ChatUser,
  type Message,
  type MessageInit,
  createMessage,
} from './types.js';
export { type SentMessage, MockChatAdapter, createMockAdapter } from './mock-adapter.js';
export { type ShellAdapterOptions, SHELL_CHANNEL, SHELL_USER, ShellChatAdapter, createShellAdapter } from './shell.js';
export {
  type TelegramAdapterOptions,
  type TelegramTextMessage,
  TelegramChatAdapter,
  createTelegramAdapter,
  toMessage,
} from './telegram.js';
