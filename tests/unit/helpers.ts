import type { BotClient } from '../../src/core/messaging/MessageSender.js';
import type { Post } from '../../src/core/model/Post.js';
import type { Trigger } from '../../src/core/model/Trigger.js';
import type { Logger } from '../../src/infra/logger/logger.js';

export const mockLogger: Logger = {
  info: () => {},
  debug: () => {},
  warn: () => {},
  error: () => {},
};

export type SentCall =
  | { op: 'reply'; postId: string; text: string }
  | { op: 'reaction'; postId: string; emoji: string }
  | { op: 'triggerList'; postId: string; triggers: Trigger[] }
  | { op: 'debug'; text: string }
  | { op: 'startup'; summary: string };

/**
 * Records every outgoing call instead of talking to a backend.
 */
export class RecordingClient implements BotClient {
  calls: SentCall[] = [];

  async reply(post: Post, text: string): Promise<void> {
    this.calls.push({ op: 'reply', postId: post.id, text });
  }

  async reaction(post: Post, emojiName: string): Promise<void> {
    this.calls.push({ op: 'reaction', postId: post.id, emoji: emojiName });
  }

  async sendTriggerList(triggers: Trigger[], post: Post): Promise<void> {
    this.calls.push({ op: 'triggerList', postId: post.id, triggers });
  }

  async debug(text: string): Promise<void> {
    this.calls.push({ op: 'debug', text });
  }

  async startup(summary: string): Promise<void> {
    this.calls.push({ op: 'startup', summary });
  }

  ops(): string[] {
    return this.calls.map((c) => c.op);
  }
}

/**
 * Hand-driven clock for Tempo.
 */
export class ManualClock {
  constructor(public current = 1_000_000) {}

  now = (): number => this.current;

  advance(ms: number): void {
    this.current += ms;
  }
}
