import type { BotClient } from '../../core/messaging/MessageSender.js';
import type { Post } from '../../core/model/Post.js';
import type { Trigger } from '../../core/model/Trigger.js';
import type { Logger } from '../../infra/logger/logger.js';

/**
 * Render triggers as a markdown table, one row per trigger.
 */
export function formatTriggerList(triggers: Trigger[]): string {
  if (triggers.length === 0) {
    return 'no triggers';
  }

  const rows = triggers.map((t) => {
    const action = t.text !== undefined ? t.text : `:${t.emoji ?? ''}:`;
    return `| ${t.triggeredBy} | ${action} |`;
  });
  return ['| trigger | action |', '| --- | --- |', ...rows].join('\n');
}

/**
 * Backend client for local runs: every outgoing call is written to the log.
 */
export class ConsoleClient implements BotClient {
  constructor(
    private readonly logger: Logger,
    private readonly debugChannel: string,
  ) {}

  async reply(post: Post, text: string): Promise<void> {
    this.logger.info('console', `[OUT] [REPLY] to=${post.id} channel=${post.channelId} text="${text}"`);
  }

  async reaction(post: Post, emojiName: string): Promise<void> {
    this.logger.info('console', `[OUT] [REACTION] to=${post.id} emoji=:${emojiName}:`);
  }

  async sendTriggerList(triggers: Trigger[], post: Post): Promise<void> {
    await this.reply(post, formatTriggerList(triggers));
  }

  async debug(text: string): Promise<void> {
    this.logger.warn('console', `[OUT] [DEBUG] channel=${this.debugChannel} text="${text}"`);
  }

  async startup(summary: string): Promise<void> {
    this.logger.info('console', `[OUT] [STARTUP] channel=${this.debugChannel}\n${summary}`);
  }
}
