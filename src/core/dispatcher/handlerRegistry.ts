import type { Post } from '../model/Post.js';
import type { Handler } from './IHandler.js';

export type PostHandler = Handler<Post>;

/**
 * Ordered set of post handlers plus the help texts they declare.
 * Registration order is dispatch order.
 */
export class HandlerRegistry {
  private handlers: PostHandler[] = [];
  private helps: Map<string, string> = new Map();

  public register(handler: PostHandler): void {
    const help = handler.help();
    if (help !== undefined) {
      // last registration wins on a name collision
      this.helps.set(handler.name(), help);
    }
    this.handlers.push(handler);
  }

  public all(): readonly PostHandler[] {
    return this.handlers;
  }

  public names(): string[] {
    return this.handlers.map((h) => h.name());
  }

  public helpNames(): string[] {
    return Array.from(this.helps.keys()).sort();
  }

  public help(name: string): string | undefined {
    return this.helps.get(name);
  }

  public get size(): number {
    return this.handlers.length;
  }
}
