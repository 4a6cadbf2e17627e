import type { Event } from '../model/Event.js';
import { ConsumerError } from '../errors.js';

export type ReceiveResult<T> =
  | { type: 'item'; item: T }
  | { type: 'timeout' }
  | { type: 'closed' };

interface Waiter<T> {
  resolve: (result: ReceiveResult<T>) => void;
  timer: NodeJS.Timeout;
}

/**
 * Unbounded FIFO between any number of producers and one consumer.
 *
 * `receive` waits at most `timeoutMs`. After `close()`, items already queued
 * are still handed out; once drained, receivers get `closed`.
 */
export class AsyncQueue<T> {
  private queue: T[] = [];
  private waiters: Waiter<T>[] = [];
  private closed = false;

  push(item: T): void {
    if (this.closed) {
      throw new ConsumerError('queue is closed');
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      clearTimeout(waiter.timer);
      waiter.resolve({ type: 'item', item });
    } else {
      this.queue.push(item);
    }
  }

  receive(timeoutMs: number): Promise<ReceiveResult<T>> {
    if (this.queue.length > 0) {
      const [item] = this.queue.splice(0, 1);
      return Promise.resolve<ReceiveResult<T>>({ type: 'item', item });
    }
    if (this.closed) {
      return Promise.resolve<ReceiveResult<T>>({ type: 'closed' });
    }

    return new Promise<ReceiveResult<T>>((resolve) => {
      const waiter: Waiter<T> = {
        resolve,
        timer: setTimeout(() => {
          this.waiters = this.waiters.filter((w) => w !== waiter);
          resolve({ type: 'timeout' });
        }, timeoutMs),
      };
      this.waiters.push(waiter);
    });
  }

  /**
   * Stop accepting items. Pending receivers are woken with `closed`.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const waiter of this.waiters) {
      clearTimeout(waiter.timer);
      waiter.resolve({ type: 'closed' });
    }
    this.waiters = [];
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.queue.length;
  }
}

export type EventQueue = AsyncQueue<Event>;

export function createEventQueue(): EventQueue {
  return new AsyncQueue<Event>();
}
