import * as readline from 'node:readline';
import type { Readable } from 'node:stream';
import { EventType } from '../../core/model/Event.js';
import { createPost } from '../../core/model/Post.js';
import type { EventQueue } from '../../core/queue/EventQueue.js';

export const CONSOLE_TEAM = 'console';
export const CONSOLE_CHANNEL = 'console';
export const CONSOLE_USER = 'console-user';

/**
 * Feeds lines typed on a terminal (or any readable stream) into the event
 * queue as posts. Says hello first and asks for shutdown at end of input.
 */
export class ConsoleProducer {
  private messageCounter = 0;
  private rl?: readline.Interface;

  constructor(
    private readonly queue: EventQueue,
    private readonly input: Readable = process.stdin,
  ) {}

  public start(botUserId = 'console-bot'): Promise<void> {
    this.queue.push({ type: EventType.Hello, serverString: 'console', myUserId: botUserId });

    const rl = readline.createInterface({ input: this.input, terminal: false });
    this.rl = rl;

    rl.on('line', (input: string) => {
      const text = input.trim();
      if (!text || this.queue.isClosed) return;

      this.queue.push({
        type: EventType.Post,
        post: createPost({
          id: `msg-${++this.messageCounter}`,
          channelId: CONSOLE_CHANNEL,
          teamId: CONSOLE_TEAM,
          userId: CONSOLE_USER,
          message: text,
        }),
      });
    });

    return new Promise<void>((resolve) => {
      rl.on('close', () => {
        if (!this.queue.isClosed) {
          this.queue.push({ type: EventType.Shutdown });
        }
        resolve();
      });
    });
  }

  public stop(): void {
    this.rl?.close();
  }
}
