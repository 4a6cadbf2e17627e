/**
 * @file Tempo - expiring key presence store used for anti-spam windows
 *
 * - `set` stores a key until `now + ttl`
 * - `exists` is true only while the expiry is strictly in the future
 * - expired keys are removed when looked up; nothing sweeps in the background,
 *   so this only suits small key spaces (per channel, per channel and trigger)
 * - `clone()` hands out another handle on the same map, not a copy
 *
 * Every operation is a single synchronous pass over the map, so no other task
 * can observe or modify it half-way through.
 */

export type Clock = () => number;

export interface TempoOptions {
  /** Milliseconds clock, defaults to Date.now */
  now?: Clock;
}

export class Tempo<K> {
  private store = new Map<K, number>();
  private readonly now: Clock;

  constructor(options: TempoOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  set(key: K, ttlMs: number): void {
    this.store.set(key, this.now() + ttlMs);
  }

  exists(key: K): boolean {
    const expiresAt = this.store.get(key);
    if (expiresAt === undefined) {
      return false;
    }

    if (expiresAt <= this.now()) {
      this.store.delete(key);
      return false;
    }
    return true;
  }

  /**
   * Another handle on the same underlying store.
   */
  clone(): Tempo<K> {
    const shared = new Tempo<K>({ now: this.now });
    shared.store = this.store;
    return shared;
  }

  /** Stored entries, stale ones included until they are looked up */
  get size(): number {
    return this.store.size;
  }
}
