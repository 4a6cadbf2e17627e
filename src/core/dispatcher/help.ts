import type { Post } from '../model/Post.js';
import type { MessageSender } from '../messaging/MessageSender.js';
import type { HandlerRegistry } from './handlerRegistry.js';

export const HELP_NOT_FOUND = 'tutétrompé';

const HELP_NAME = /^!help ([a-zA-Z0-9_-]+).*/;

/**
 * Built-in `!help` command.
 * - `!help` lists every handler that has help, sorted, one `name` per line
 * - `!help <name>` replies with that handler's help text
 * @returns true when the post was a help command
 */
export async function processHelp(
  post: Post,
  registry: HandlerRegistry,
  sender: MessageSender,
): Promise<boolean> {
  if (post.message === '!help') {
    const reply = registry
      .helpNames()
      .map((name) => `\`${name}\`\n`)
      .join('');
    await sender.reply(post, reply);
    return true;
  }

  const captures = HELP_NAME.exec(post.message);
  if (!captures) {
    return false;
  }

  const help = registry.help(captures[1]);
  await sender.reply(post, help ?? HELP_NOT_FOUND);
  return true;
}
