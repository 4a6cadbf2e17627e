import { describe, it, expect } from 'vitest';
import { AsyncQueue } from '../../../src/core/queue/EventQueue.js';
import { ConsumerError } from '../../../src/core/errors.js';

describe('AsyncQueue', () => {
  it('should hand out queued items in FIFO order', async () => {
    const q = new AsyncQueue<string>();
    q.push('a');
    q.push('b');
    expect(await q.receive(10)).toEqual({ type: 'item', item: 'a' });
    expect(await q.receive(10)).toEqual({ type: 'item', item: 'b' });
    expect(q.size).toBe(0);
  });

  it('should wake a waiting receiver when an item is pushed', async () => {
    const q = new AsyncQueue<number>();
    const pending = q.receive(1000);
    q.push(42);
    expect(await pending).toEqual({ type: 'item', item: 42 });
  });

  it('should time out when nothing arrives', async () => {
    const q = new AsyncQueue<number>();
    expect(await q.receive(5)).toEqual({ type: 'timeout' });

    // the timed out receiver must not swallow the next item
    q.push(7);
    expect(await q.receive(5)).toEqual({ type: 'item', item: 7 });
  });

  it('should drain queued items before reporting closed', async () => {
    const q = new AsyncQueue<number>();
    q.push(1);
    q.close();
    expect(await q.receive(5)).toEqual({ type: 'item', item: 1 });
    expect(await q.receive(5)).toEqual({ type: 'closed' });
  });

  it('should wake waiting receivers on close', async () => {
    const q = new AsyncQueue<number>();
    const pending = q.receive(1000);
    q.close();
    expect(await pending).toEqual({ type: 'closed' });
  });

  it('should reject pushes after close', () => {
    const q = new AsyncQueue<number>();
    q.close();
    expect(() => q.push(1)).toThrow(ConsumerError);
    expect(q.isClosed).toBe(true);
  });
});
