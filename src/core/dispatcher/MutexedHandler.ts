import type { Handler } from './IHandler.js';

/**
 * Gives a handler exclusive access to its own state: at most one `handle`
 * call runs at a time, later calls wait for the previous one to settle.
 */
export class MutexedHandler<T> implements Handler<T> {
  private lock: Promise<void> = Promise.resolve();

  constructor(private readonly handler: Handler<T>) {}

  name(): string {
    return this.handler.name();
  }

  help(): string | undefined {
    return this.handler.help();
  }

  async handle(data: T): Promise<void> {
    const previous = this.lock;
    let release: () => void = () => {};
    this.lock = new Promise<void>((resolve) => {
      release = resolve;
    });

    try {
      await previous;
      await this.handler.handle(data);
    } finally {
      release();
    }
  }
}
