/**
 * Shell chat adapter
 * Every input line is a direct message from a single local user;
 * everything the bot sends is printed back.
 */

import { createInterface, type Interface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { type Logger, createSilentLogger } from '../core/logger.js';
import { toError } from '../services/error-handler.js';
import { type ChatAdapter, type ChatChannel, type ChatRobot, type ChatUser, createMessage } from './types.js';

export const SHELL_USER: ChatUser = {
  id: 'shell_user',
  name: '[Shell User]',
  email: 'user@example.com',
  isBot: false,
};

export const SHELL_CHANNEL: ChatChannel = {
  id: 'shell_channel',
  name: 'shell channel',
};

export interface ShellAdapterOptions {
  input?: Readable;
  output?: Writable;
  logger?: Logger;
}

let nextId = 0;

export class ShellChatAdapter implements ChatAdapter {
  readonly id: string;
  readonly name = 'shell';
  private readonly input: Readable;
  private readonly output: Writable;
  private readonly logger: Logger;
  private lines: Interface | null = null;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(private readonly robot: ChatRobot, options: ShellAdapterOptions = {}) {
    this.id = String(nextId++);
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
    this.logger = options.logger ?? createSilentLogger();
  }

  async run(): Promise<void> {
    if (this.lines) {
      return;
    }

    const lines = createInterface({ input: this.input, terminal: false });
    lines.on('line', (line) => this.deliver(line));
    lines.on('close', () => {
      this.logger.debug('Shell input closed');
    });
    this.lines = lines;
    this.logger.info('Shell adapter reading input');
  }

  async stop(): Promise<void> {
    this.lines?.close();
    this.lines = null;
    await Promise.all(this.inFlight);
  }

  async send(_channelId: string, text: string): Promise<void> {
    this.output.write(`SEND: ${text}\n`);
  }

  async sendDirectMessage(_userId: string, text: string): Promise<void> {
    await this.send('', `DIRECT MESSAGE: ${text}`);
  }

  /**
   * Resolves once every line read so far has been handled
   */
  async idle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight);
    }
  }

  private deliver(line: string): void {
    const message = createMessage({
      text: line,
      user: SHELL_USER,
      channel: SHELL_CHANNEL,
      isDirect: true,
    });

    const delivery = this.robot
      .receive(message)
      .catch((error: unknown) => {
        this.robot.reportError(toError(error), { adapter: this.name });
      })
      .finally(() => {
        this.inFlight.delete(delivery);
      });
    this.inFlight.add(delivery);
  }
}

export function createShellAdapter(options: ShellAdapterOptions = {}): (robot: ChatRobot) => ShellChatAdapter {
  return (robot) => new ShellChatAdapter(robot, options);
}
