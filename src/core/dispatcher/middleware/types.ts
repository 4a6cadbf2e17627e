import type { Event } from '../../model/Event.js';

/**
 * Outcome of a middleware step: keep going with a (possibly new) event,
 * or drop the event.
 */
export type Continue = { type: 'yes'; event: Event } | { type: 'no' };

export const Continue = {
  yes: (event: Event): Continue => ({ type: 'yes', event }),
  no: (): Continue => ({ type: 'no' }),
};

/**
 * A chain stage run on every event before handler dispatch.
 * Throwing is fatal to the event loop.
 */
export interface Middleware {
  name(): string;
  process(event: Event): Promise<Continue>;
}
