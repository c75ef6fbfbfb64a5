/**
 * Mock chat adapter
 * Connects to nothing; records everything handlers send so tests can
 * assert on it, and lets tests inject inbound messages.
 */

import type { ChatAdapter, ChatAdapterFactory, ChatRobot, Message } from './types.js';

export interface SentMessage {
  text: string;
  channelId?: string;
  userId?: string;
  isDirect: boolean;
}

let nextId = 0;

export class MockChatAdapter implements ChatAdapter {
  readonly id: string;
  readonly name = 'mock';
  sent: SentMessage[] = [];
  sentPublic: SentMessage[] = [];
  sentDirect: SentMessage[] = [];
  running = false;

  constructor(private readonly robot?: ChatRobot) {
    this.id = String(nextId++);
  }

  async run(): Promise<void> {
    this.running = true;
  }

  async stop(): Promise<void> {
    this.running = false;
  }

  async send(channelId: string, text: string): Promise<void> {
    const entry: SentMessage = { text, channelId, isDirect: false };
    this.sent.push(entry);
    this.sentPublic.push(entry);
  }

  async sendDirectMessage(userId: string, text: string): Promise<void> {
    const entry: SentMessage = { text, userId, isDirect: true };
    this.sent.push(entry);
    this.sentDirect.push(entry);
  }

  /** Texts of everything sent so far, in order */
  sentTexts(): string[] {
    return this.sent.map(entry => entry.text);
  }

  clear(): void {
    this.sent = [];
    this.sentPublic = [];
    this.sentDirect = [];
  }

  /** Delivers a message to the robot as if it came from the chat */
  async receive(message: Message): Promise<void> {
    if (!this.robot) {
      throw new Error('Mock adapter has no robot to deliver to');
    }
    await this.robot.receive(message);
  }
}

export const createMockAdapter: ChatAdapterFactory = (robot) => new MockChatAdapter(robot);
