import { EventType, type Event } from '../../model/Event.js';
import { StatusCode } from '../../model/Status.js';
import type { Logger } from '../../../infra/logger/logger.js';
import { Continue, type Middleware } from './types.js';

/**
 * Truncate text to max length, show truncation indicator
 */
export function truncateText(text: string, maxLen: number = 20): string {
  if (text.length <= maxLen) return text;
  return text.substring(0, maxLen) + '…(' + (text.length - maxLen) + ' more)';
}

/**
 * Format event for logging with structured fields.
 * IN format: [IN] [POST] team=xxx channel=xxx from=xxx text="..."
 */
export function formatIncomingLog(event: Event): string {
  switch (event.type) {
    case EventType.Post: {
      const { post } = event;
      const fields = [`[IN]`, `[POST]`];
      if (post.teamId) fields.push(`team=${post.teamId}`);
      fields.push(`channel=${post.channelId}`, `from=${post.userId}`);
      fields.push(`text="${truncateText(post.message)}"`);
      return fields.join(' ');
    }
    case EventType.PostEdited:
      return `[IN] [EDIT] channel=${event.post.channelId} from=${event.post.userId} text="${truncateText(event.post.message)}"`;
    case EventType.Hello:
      return `[IN] [HELLO] server="${event.serverString}" me=${event.myUserId}`;
    case EventType.Status: {
      const fields = [`[IN]`, `[STATUS]`, `code=${event.status.code}`];
      if (event.status.code !== StatusCode.OK && event.status.error) {
        fields.push(`message="${event.status.error.message}"`);
      }
      return fields.join(' ');
    }
    case EventType.Unsupported:
      return `[IN] [UNSUPPORTED] raw="${truncateText(event.raw, 40)}"`;
    case EventType.Shutdown:
      return `[IN] [SHUTDOWN]`;
  }
}

/**
 * Logs every incoming event with structured fields and lets it through.
 */
export class LoggingMiddleware implements Middleware {
  constructor(private readonly logger: Logger) {}

  name(): string {
    return 'logging';
  }

  async process(event: Event): Promise<Continue> {
    this.logger.info('dispatcher', formatIncomingLog(event));
    return Continue.yes(event);
  }
}
