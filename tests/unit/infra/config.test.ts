import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadConfig } from '../../../src/infra/config/config.js';

describe('loadConfig', () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'relaybot-config-'));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function write(name: string, content: string): string {
    const path = join(dir, name);
    writeFileSync(path, content, 'utf-8');
    return path;
  }

  it('should apply defaults to an empty file', () => {
    const cfg = loadConfig({ path: write('empty.yaml', ''), env: {} });

    expect(cfg).toEqual({
      app: { name: 'relaybot', env: 'prod' },
      logging: { level: 'info', color: true },
      bot: {
        debugChannel: 'debug',
        userId: undefined,
        receiveTimeoutMs: 5000,
        channelRateLimitMs: 3000,
        triggerRepeatDelayMs: 120_000,
        debugHandler: false,
      },
    });
  });

  it('should read values from the file', () => {
    const path = write(
      'full.yaml',
      [
        'app:',
        '  name: testbot',
        '  env: dev',
        'logging:',
        '  level: debug',
        '  color: false',
        'bot:',
        '  debugChannel: ops',
        '  userId: 1234',
        '  triggerRepeatDelayMs: 60000',
        '  debugHandler: true',
      ].join('\n'),
    );

    const cfg = loadConfig({ path, env: {} });

    expect(cfg.app).toEqual({ name: 'testbot', env: 'dev' });
    expect(cfg.logging).toEqual({ level: 'debug', color: false });
    expect(cfg.bot.debugChannel).toBe('ops');
    expect(cfg.bot.userId).toBe('1234');
    expect(cfg.bot.triggerRepeatDelayMs).toBe(60_000);
    expect(cfg.bot.channelRateLimitMs).toBe(3000);
    expect(cfg.bot.debugHandler).toBe(true);
  });

  it('should let the environment override the file', () => {
    const path = write('env.yaml', 'bot:\n  debugChannel: ops\n');

    const cfg = loadConfig({
      path,
      env: { NODE_ENV: 'test', BOT_LOG_LEVEL: 'warn', BOT_DEBUG_CHAN: 'alerts', BOT_USER_ID: 'bot-1' },
    });

    expect(cfg.app.env).toBe('test');
    expect(cfg.logging.level).toBe('warn');
    expect(cfg.bot.debugChannel).toBe('alerts');
    expect(cfg.bot.userId).toBe('bot-1');
  });

  it('should find the file through BOT_CONFIG', () => {
    const path = write('located.yaml', 'app:\n  name: located\n');

    expect(loadConfig({ env: { BOT_CONFIG: path } }).app.name).toBe('located');
  });

  it('should reject invalid values', () => {
    const path = write('bad.yaml', 'bot:\n  receiveTimeoutMs: -1\n');

    expect(() => loadConfig({ path, env: {} })).toThrow(/bot\.receiveTimeoutMs/);
  });
});
