import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse } from 'yaml';
import { z } from 'zod';

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

const FileConfigSchema = z.object({
  app: z
    .object({
      name: z.string().optional(),
      env: z.enum(['dev', 'prod', 'test']).optional(),
    })
    .optional(),
  logging: z
    .object({
      level: LogLevelSchema.optional(),
      color: z.boolean().optional(),
    })
    .optional(),
  bot: z
    .object({
      debugChannel: z.string().optional(),
      userId: z.coerce.string().optional(),
      receiveTimeoutMs: z.number().int().positive().optional(),
      channelRateLimitMs: z.number().int().nonnegative().optional(),
      triggerRepeatDelayMs: z.number().int().nonnegative().optional(),
      debugHandler: z.boolean().optional(),
    })
    .optional(),
});

type FileConfig = z.infer<typeof FileConfigSchema>;

export type AppConfig = {
  app: {
    name: string;
    env: 'dev' | 'prod' | 'test';
  };
  logging: {
    level: z.infer<typeof LogLevelSchema>;
    color: boolean;
  };
  bot: {
    /** Channel receiving handler failures and the startup summary */
    debugChannel: string;
    /** The bot's own user id, when known before the backend says hello */
    userId?: string;
    receiveTimeoutMs: number;
    channelRateLimitMs: number;
    triggerRepeatDelayMs: number;
    debugHandler: boolean;
  };
};

export interface LoadConfigOptions {
  /** Explicit config file; falls back to BOT_CONFIG, then config/default.yaml */
  path?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Read the YAML config file, validate it and apply environment overrides.
 * Called once at startup; the result is passed to every component that needs it.
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const env = options.env ?? process.env;
  const filePath = options.path ?? env.BOT_CONFIG ?? resolve(process.cwd(), 'config', 'default.yaml');
  const raw = readFileSync(filePath, 'utf-8');

  const parsed = FileConfigSchema.nullish().safeParse(parse(raw));
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid config ${filePath}: ${issues}`);
  }
  const cfg: FileConfig = parsed.data ?? {};

  const envName = z.enum(['dev', 'prod', 'test']).safeParse(env.NODE_ENV);
  const envLevel = LogLevelSchema.safeParse(env.BOT_LOG_LEVEL);

  return {
    app: {
      name: cfg.app?.name ?? 'relaybot',
      env: envName.success ? envName.data : cfg.app?.env ?? 'prod',
    },
    logging: {
      level: envLevel.success ? envLevel.data : cfg.logging?.level ?? 'info',
      color: cfg.logging?.color ?? true,
    },
    bot: {
      debugChannel: env.BOT_DEBUG_CHAN ?? cfg.bot?.debugChannel ?? 'debug',
      userId: env.BOT_USER_ID ?? cfg.bot?.userId,
      receiveTimeoutMs: cfg.bot?.receiveTimeoutMs ?? 5000,
      channelRateLimitMs: cfg.bot?.channelRateLimitMs ?? 3000,
      triggerRepeatDelayMs: cfg.bot?.triggerRepeatDelayMs ?? 120_000,
      debugHandler: cfg.bot?.debugHandler ?? false,
    },
  };
}
