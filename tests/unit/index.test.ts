import { describe, it, expect } from 'vitest';
import * as relaybot from '../../src/index.js';

describe('package entry point', () => {
  it('should expose the error class and the status helpers side by side', () => {
    const err = new relaybot.StatusError('bad gateway', 502);
    expect(err).toBeInstanceOf(relaybot.BotError);
    expect(err.statusCode).toBe(502);

    const body: relaybot.StatusErrorBody = relaybot.noneStatusError();
    expect(body.message).toBe('none');
    expect(relaybot.StatusCode.Unknown).toBe('unknown');
  });

  it('should expose the dispatcher and the trigger handler', () => {
    expect(typeof relaybot.Dispatcher).toBe('function');
    expect(typeof relaybot.TriggerHandler).toBe('function');
    expect(relaybot.validMatch('hi', 'say hi')).toBe(true);
  });
});
