import type { Post } from '../model/Post.js';

/**
 * A unit of work reacting to chat messages.
 *
 * Every registered handler sees every message, so `handle` must quietly
 * return on messages it does not recognize. Throwing reports the error to
 * the debug channel; it never stops the event loop.
 */
export interface Handler<T = Post> {
  /** Unique name, used by `!help <name>` and the startup summary */
  name(): string;

  /** Help text; handlers without one are left out of `!help` */
  help(): string | undefined;

  handle(data: T): Promise<void>;
}
