import { describe, it, expect, vi } from 'vitest';
import {
  LoggingMiddleware,
  formatIncomingLog,
  truncateText,
} from '../../../src/core/dispatcher/middleware/loggingMiddleware.js';
import { EventType, type Event } from '../../../src/core/model/Event.js';
import { createPost } from '../../../src/core/model/Post.js';
import { StatusCode } from '../../../src/core/model/Status.js';
import type { Logger } from '../../../src/infra/logger/logger.js';

describe('truncateText', () => {
  it('should keep short text', () => {
    expect(truncateText('short')).toBe('short');
  });

  it('should cut long text and count the rest', () => {
    expect(truncateText('abcdefghij', 4)).toBe('abcd…(6 more)');
  });
});

describe('formatIncomingLog', () => {
  it('should format posts with team, channel and author', () => {
    const event: Event = {
      type: EventType.Post,
      post: createPost({ teamId: 't1', channelId: 'c1', userId: 'u1', message: 'hello' }),
    };
    expect(formatIncomingLog(event)).toBe('[IN] [POST] team=t1 channel=c1 from=u1 text="hello"');
  });

  it('should include the error message of failing statuses', () => {
    const event: Event = {
      type: EventType.Status,
      status: { code: StatusCode.Error, error: { message: 'denied', detailedError: '', statusCode: 403 } },
    };
    expect(formatIncomingLog(event)).toBe('[IN] [STATUS] code=error message="denied"');
  });

  it('should format shutdown', () => {
    expect(formatIncomingLog({ type: EventType.Shutdown })).toBe('[IN] [SHUTDOWN]');
  });
});

describe('LoggingMiddleware', () => {
  it('should log the event and pass it on unchanged', async () => {
    const info = vi.fn();
    const logger: Logger = { info, debug: () => {}, warn: () => {}, error: () => {} };
    const mw = new LoggingMiddleware(logger);
    const event: Event = { type: EventType.Hello, serverString: '9.0', myUserId: 'bot' };

    expect(await mw.process(event)).toEqual({ type: 'yes', event });
    expect(info).toHaveBeenCalledWith('dispatcher', '[IN] [HELLO] server="9.0" me=bot');
    expect(mw.name()).toBe('logging');
  });
});
