/**
 * Telegram chat adapter
 * Long-polls Telegram through grammY and turns text messages into
 * robot messages. Private chats count as direct messages.
 */

import { Bot } from 'grammy';
import { type Logger, createSilentLogger } from '../core/logger.js';
import { toError } from '../services/error-handler.js';
import { type ChatAdapter, type ChatRobot, type Message, createMessage } from './types.js';

/**
 * The fields of a Telegram text message the adapter reads
 */
export interface TelegramTextMessage {
  message_id: number;
  date: number;
  text: string;
  from?: {
    id: number;
    is_bot: boolean;
    first_name: string;
    username?: string;
  };
  chat: {
    id: number;
    type: string;
    title?: string;
    username?: string;
    first_name?: string;
  };
}

export interface TelegramAdapterOptions {
  token: string;
  logger?: Logger;
  /** Prebuilt grammY bot, used by tests to avoid network calls */
  bot?: Bot;
}

export function toMessage(raw: TelegramTextMessage): Message {
  const chatName = raw.chat.title ?? raw.chat.username ?? raw.chat.first_name ?? String(raw.chat.id);
  const archiveLink = raw.chat.type === 'supergroup' && raw.chat.username
    ? `https://t.me/${raw.chat.username}/${raw.message_id}`
    : undefined;

  return createMessage({
    text: raw.text,
    user: raw.from
      ? {
          id: String(raw.from.id),
          name: raw.from.username ?? raw.from.first_name,
          isBot: raw.from.is_bot,
        }
      : undefined,
    channel: { id: String(raw.chat.id), name: chatName },
    isDirect: raw.chat.type === 'private',
    archiveLink,
    timestamp: new Date(raw.date * 1000).toISOString(),
  });
}

export class TelegramChatAdapter implements ChatAdapter {
  readonly id: string;
  readonly name = 'telegram';
  private readonly bot: Bot;
  private readonly logger: Logger;
  private polling: Promise<void> | null = null;

  constructor(private readonly robot: ChatRobot, options: TelegramAdapterOptions) {
    // The numeric prefix of a bot token identifies the bot account
    this.id = options.token.split(':')[0];
    this.bot = options.bot ?? new Bot(options.token);
    this.logger = options.logger ?? createSilentLogger();

    this.bot.on('message:text', async (ctx) => {
      try {
        await this.robot.receive(toMessage(ctx.message));
      } catch (error) {
        this.robot.reportError(toError(error), { adapter: this.name, updateId: ctx.update.update_id });
      }
    });

    // Failures outside message delivery, raised while polling

    this.bot.catch((err) => {
      this.robot.reportError(toError(err.error), {
        adapter: this.name,
        updateId: err.ctx.update.update_id,
      });
    });
  }

  async run(): Promise<void> {
    if (this.polling) {
      return;
    }

    this.polling = this.bot
      .start({
        onStart: (botInfo) => {
          this.logger.info(`Telegram bot started: @${botInfo.username}`);
        },
      })
      .catch((error: unknown) => {
        this.robot.reportError(toError(error), { adapter: this.name });
      });
  }

  async stop(): Promise<void> {
    if (!this.polling) {
      return;
    }
    await this.bot.stop();
    await this.polling;
    this.polling = null;
  }

  async send(channelId: string, text: string): Promise<void> {
    await this.bot.api.sendMessage(channelId, text);
  }

  /**
   * A private chat shares its id with the user
   */
  async sendDirectMessage(userId: string, text: string): Promise<void> {
    await this.bot.api.sendMessage(userId, text);
  }
}

export function createTelegramAdapter(
  options: TelegramAdapterOptions
): (robot: ChatRobot) => TelegramChatAdapter {
  return (robot) => new TelegramChatAdapter(robot, options);
}
