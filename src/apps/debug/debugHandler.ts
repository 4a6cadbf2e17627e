import type { Handler } from '../../core/dispatcher/IHandler.js';
import type { Post } from '../../core/model/Post.js';
import type { Logger } from '../../infra/logger/logger.js';

/**
 * Logs every post it is given. Useful when wiring a new backend.
 */
export class DebugHandler implements Handler {
  constructor(
    private readonly logger: Logger,
    private readonly label = 'debug',
  ) {}

  name(): string {
    return 'debug';
  }

  help(): undefined {
    return undefined;
  }

  async handle(post: Post): Promise<void> {
    this.logger.debug(this.label, `post ${post.id} in ${post.teamId}/${post.channelId} from ${post.userId}: ${post.message}`);
  }
}
