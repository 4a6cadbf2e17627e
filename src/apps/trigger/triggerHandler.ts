import type { Handler } from '../../core/dispatcher/IHandler.js';
import type { MessageSender } from '../../core/messaging/MessageSender.js';
import type { Post } from '../../core/model/Post.js';
import type { Trigger } from '../../core/model/Trigger.js';
import type { TriggerStore } from '../../core/storage/TriggerStore.js';
import type { Tempo } from '../../core/tempo/Tempo.js';
import { errorMessage, type Logger } from '../../infra/logger/logger.js';
import { compileTrigger, validMatch } from './match.js';

export const ACK_EMOJI = 'ok_hand';

const COMMAND_PREFIX = '!trigger ';

const MATCH_LIST = /^!trigger list.*$/;
const MATCH_DEL = /^!trigger del "(.+)".*/;
const MATCH_REACTION = /^!trigger reaction "([^"]+)" [:"]([^:]+)[:"].*$/;
const MATCH_TEXT = /^!trigger text "([^"]+)" "([^"]+)".*$/;

export interface TriggerHandlerOptions {
  store: TriggerStore;
  sender: MessageSender;
  /** Shared handle; other components may hold clones of it */
  tempo: Tempo<string>;
  logger: Logger;
  /** Per (channel, trigger) antispam window */
  repeatDelayMs?: number;
  /** Per channel antispam window */
  channelRateLimitMs?: number;
}

export function channelRateLimitKey(post: Post): string {
  return `${post.teamId}${post.channelId}--global-channel-rate-limit`;
}

export function triggerRateLimitKey(post: Post, triggeredBy: string): string {
  return `${post.teamId}${post.channelId}${triggeredBy}--trigger-channel-rate-limit`;
}

/**
 * Reacts to stored words in every message, and manages them through
 * `!trigger` commands.
 */
export class TriggerHandler implements Handler {
  private readonly store: TriggerStore;
  private readonly sender: MessageSender;
  private readonly tempo: Tempo<string>;
  private readonly logger: Logger;
  private readonly repeatDelayMs: number;
  private readonly channelRateLimitMs: number;

  constructor(options: TriggerHandlerOptions) {
    this.store = options.store;
    this.sender = options.sender;
    this.tempo = options.tempo;
    this.logger = options.logger;
    this.repeatDelayMs = options.repeatDelayMs ?? 120_000;
    this.channelRateLimitMs = options.channelRateLimitMs ?? 3000;
  }

  name(): string {
    return 'trigger';
  }

  help(): string {
    const channelSeconds = Math.floor(this.channelRateLimitMs / 1000);
    const repeatSeconds = Math.floor(this.repeatDelayMs / 1000);
    return `\`\`\`
Automatically react to a given text in each received message on channels where the bot is present.

There is a per channel antispam of ${channelSeconds} seconds, avoiding a heated channel to be polluted by the bot.

A per [channel, trigger] antispam is effective and currently configured at ${repeatSeconds} seconds.

!trigger list
!trigger text "trigger" "me"
!trigger reaction "trigger" :emoji:
!trigger del "trigger"
\`\`\``;
  }

  async handle(post: Post): Promise<void> {
    if (!post.message.startsWith(COMMAND_PREFIX)) {
      return this.react(post);
    }
    return this.command(post);
  }

  private async react(post: Post): Promise<void> {
    // one search per channel per window, so a heated channel is not flooded
    const channelKey = channelRateLimitKey(post);
    if (this.tempo.exists(channelKey)) {
      return;
    }
    this.tempo.set(channelKey, this.channelRateLimitMs);

    const teamTriggers = await this.store.search(post.teamId);
    const matched = orderTextFirst(
      teamTriggers.filter((t) => validMatch(t.triggeredBy, post.message)),
    );

    for (const trigger of matched) {
      const triggerKey = triggerRateLimitKey(post, trigger.triggeredBy);
      if (this.tempo.exists(triggerKey)) {
        continue;
      }
      this.tempo.set(triggerKey, this.repeatDelayMs);

      if (trigger.text !== undefined) {
        // a text reply wins over every emoji trigger of the same message
        this.logger.debug('trigger', `Replying to "${trigger.triggeredBy}" in ${post.channelId}`);
        await this.sender.reply(post, trigger.text);
        break;
      }
      if (trigger.emoji !== undefined) {
        this.logger.debug('trigger', `Reacting :${trigger.emoji}: to "${trigger.triggeredBy}"`);
        await this.sender.reaction(post, trigger.emoji);
      }
    }
  }

  private async command(post: Post): Promise<void> {
    const message = post.message;

    if (MATCH_LIST.test(message)) {
      const triggers = await this.store.list(post.teamId);
      await this.sender.sendTriggerList(triggers, post);
      return;
    }

    const text = MATCH_TEXT.exec(message);
    if (text) {
      const [, trigger, replacement] = text;
      await this.add(post, trigger, () => this.store.addText(post.teamId, trigger, replacement));
      return;
    }

    const reaction = MATCH_REACTION.exec(message);
    if (reaction) {
      const [, trigger, emoji] = reaction;
      await this.add(post, trigger, () => this.store.addEmoji(post.teamId, trigger, emoji));
      return;
    }

    const del = MATCH_DEL.exec(message);
    if (del) {
      const trigger = del[1];
      await this.persist('del', () => this.store.del(post.teamId, trigger));
      await this.sender.reaction(post, ACK_EMOJI);
    }
  }

  private async add(post: Post, trigger: string, write: () => Promise<void>): Promise<void> {
    const compiled = compileTrigger(trigger);
    if (!compiled.ok) {
      await this.sender.reply(post, compiled.error);
      return;
    }

    await this.persist('add', write);
    await this.sender.reaction(post, ACK_EMOJI);
  }

  // Storage failures are logged but the command is still acknowledged.
  // TODO: reply with the failure instead of the ok reaction once users can act on it
  private async persist(operation: string, write: () => Promise<void>): Promise<void> {
    try {
      await write();
    } catch (err) {
      this.logger.warn('trigger', `Trigger ${operation} failed: ${errorMessage(err)}`);
    }
  }
}

/**
 * Text triggers first, keeping the store's order within each kind.
 */
function orderTextFirst(triggers: Trigger[]): Trigger[] {
  const texts = triggers.filter((t) => t.text !== undefined);
  const others = triggers.filter((t) => t.text === undefined);
  return [...texts, ...others];
}
