import { EventType, type Event } from '../../model/Event.js';
import type { Logger } from '../../../infra/logger/logger.js';
import { Continue, type Middleware } from './types.js';

/**
 * Drops posts written by the bot itself, so it never answers its own replies.
 * The bot's user id comes from the constructor or from the backend's hello.
 */
export class IgnoreSelf implements Middleware {
  private myUserId?: string;

  constructor(
    private readonly logger: Logger,
    myUserId?: string,
  ) {
    this.myUserId = myUserId;
  }

  name(): string {
    return 'ignore_self';
  }

  async process(event: Event): Promise<Continue> {
    switch (event.type) {
      case EventType.Hello:
        if (event.myUserId && event.myUserId !== this.myUserId) {
          this.logger.debug('ignore-self', `Bot user id is now ${event.myUserId}`);
          this.myUserId = event.myUserId;
        }
        return Continue.yes(event);
      case EventType.Post:
      case EventType.PostEdited:
        if (this.myUserId !== undefined && event.post.userId === this.myUserId) {
          return Continue.no();
        }
        return Continue.yes(event);
      default:
        return Continue.yes(event);
    }
  }
}
