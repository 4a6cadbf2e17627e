import type { Post } from '../model/Post.js';
import type { Trigger } from '../model/Trigger.js';

/**
 * Outgoing chat operations. Implementations throw BackendError on failure.
 */
export interface MessageSender {
  /**
   * Reply to a post, in its thread when it has one.
   */
  reply(post: Post, text: string): Promise<void>;

  /**
   * Add an emoji reaction (name without colons, e.g. "ok_hand") to a post.
   */
  reaction(post: Post, emojiName: string): Promise<void>;

  /**
   * Send a formatted list of triggers as a reply to `post`.
   */
  sendTriggerList(triggers: Trigger[], post: Post): Promise<void>;
}

/**
 * Side channel for the bot operators.
 */
export interface Notifier {
  /** Post to the debug channel */
  debug(text: string): Promise<void>;

  /** Announce the loaded middlewares and handlers */
  startup(summary: string): Promise<void>;
}

export type BotClient = MessageSender & Notifier;
