import { EventType, type Event } from '../model/Event.js';
import type { Post } from '../model/Post.js';
import { StatusCode, noneStatusError, type Status } from '../model/Status.js';
import type { BotClient } from '../messaging/MessageSender.js';
import type { EventQueue } from '../queue/EventQueue.js';
import { ConsumerError, MiddlewareError, StatusError } from '../errors.js';
import { errorMessage, type Logger } from '../../infra/logger/logger.js';
import { HandlerRegistry, type PostHandler } from './handlerRegistry.js';
import type { Continue, Middleware } from './middleware/types.js';
import { processHelp } from './help.js';

export const DEFAULT_RECEIVE_TIMEOUT_MS = 5000;

export interface DispatcherOptions {
  /** Longest wait on the queue before looping again */
  receiveTimeoutMs?: number;
}

/**
 * The event loop: pulls events off the queue one at a time, runs them
 * through the middleware chain and dispatches chat posts to every handler.
 *
 * `run` resolves on a shutdown event and rejects on fatal errors (middleware
 * failure, closed queue, failing backend status, failed startup announcement
 * or help reply).
 * Handler failures are reported to the debug channel and never fatal.
 */
export class Dispatcher {
  private middlewares: Middleware[] = [];
  private registry = new HandlerRegistry();
  private readonly receiveTimeoutMs: number;

  constructor(
    private readonly client: BotClient,
    private readonly logger: Logger,
    options: DispatcherOptions = {},
  ) {
    this.receiveTimeoutMs = options.receiveTimeoutMs ?? DEFAULT_RECEIVE_TIMEOUT_MS;
  }

  public addMiddleware(middleware: Middleware): this {
    this.middlewares.push(middleware);
    return this;
  }

  public addPostHandler(handler: PostHandler): this {
    this.registry.register(handler);
    return this;
  }

  public summary(): string {
    let loaded = '## Loaded middlewares\n';
    for (const m of this.middlewares) {
      loaded += ` * \`${m.name()}\`\n`;
    }
    loaded += '## Loaded post handlers\n';
    for (const name of this.registry.names()) {
      loaded += ` * \`${name}\`\n`;
    }
    return loaded;
  }

  public async run(queue: EventQueue): Promise<void> {
    await this.client.startup(this.summary());
    this.logger.info(
      'dispatcher',
      `Started with ${this.middlewares.length} middleware(s) and ${this.registry.size} handler(s)`,
    );

    for (;;) {
      const next = await queue.receive(this.receiveTimeoutMs);
      switch (next.type) {
        case 'timeout':
          continue;
        case 'closed':
          throw new ConsumerError('receiving channel closed');
        case 'item':
          if (next.item.type === EventType.Shutdown) {
            this.logger.info('dispatcher', 'Shutdown requested, leaving event loop');
            return;
          }
          await this.process(next.item);
      }
    }
  }

  /**
   * Run one event through the middleware chain, then act on it.
   */
  public async process(event: Event): Promise<void> {
    const survived = await this.processMiddlewares(event);
    if (survived) {
      await this.processEvent(survived);
    }
  }

  private async processMiddlewares(event: Event): Promise<Event | null> {
    let current = event;
    for (const middleware of this.middlewares) {
      let outcome: Continue;
      try {
        outcome = await middleware.process(current);
      } catch (err) {
        this.logger.error('dispatcher', `Middleware ${middleware.name()} failed: ${errorMessage(err)}`);
        throw new MiddlewareError(middleware.name(), err);
      }

      if (outcome.type === 'no') {
        this.logger.debug('dispatcher', `Event ${current.type} dropped by ${middleware.name()}`);
        return null;
      }
      current = outcome.event;
    }
    return current;
  }

  private async processEvent(event: Event): Promise<void> {
    switch (event.type) {
      case EventType.Post:
        return this.processPost(event.post);
      case EventType.PostEdited:
        this.logger.debug('dispatcher', 'Edits are unsupported for now');
        return;
      case EventType.Unsupported:
        this.logger.debug('dispatcher', `Unsupported event: ${event.raw}`);
        return;
      case EventType.Hello:
        this.logger.info('dispatcher', `Hello server ${event.serverString}`);
        return;
      case EventType.Status:
        return this.processStatus(event.status);
      case EventType.Shutdown:
        // handled by run() before reaching the chain
        return;
    }
  }

  private processStatus(status: Status): void {
    const error = status.error ?? noneStatusError();
    switch (status.code) {
      case StatusCode.OK:
        return;
      case StatusCode.Unsupported:
        this.logger.warn('dispatcher', `Unsupported status: ${error.message}`);
        return;
      case StatusCode.Error:
      case StatusCode.Unknown:
        throw new StatusError(error.message, error.statusCode);
    }
  }

  private async processPost(post: Post): Promise<void> {
    // a failed help reply is a backend failure and ends the loop
    await processHelp(post, this.registry, this.client);

    for (const handler of this.registry.all()) {
      try {
        await handler.handle(post);
      } catch (err) {
        await this.report(handler.name(), err);
      }
    }
  }

  private async report(source: string, err: unknown): Promise<void> {
    this.logger.warn('dispatcher', `Handler ${source} failed: ${errorMessage(err)}`);
    try {
      await this.client.debug(`error: ${errorMessage(err)}`);
    } catch (debugErr) {
      this.logger.error('dispatcher', `Debug notification failed: ${errorMessage(debugErr)}`);
    }
  }
}
