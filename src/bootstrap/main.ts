import { loadConfig, type AppConfig } from '../infra/config/config.js';
import { createLogger, errorMessage, type Logger } from '../infra/logger/logger.js';
import { Dispatcher } from '../core/dispatcher/dispatcher.js';
import { MutexedHandler } from '../core/dispatcher/MutexedHandler.js';
import { IgnoreSelf } from '../core/dispatcher/middleware/ignoreSelf.js';
import { LoggingMiddleware } from '../core/dispatcher/middleware/loggingMiddleware.js';
import type { BotClient } from '../core/messaging/MessageSender.js';
import { createEventQueue, type EventQueue } from '../core/queue/EventQueue.js';
import { InMemoryTriggerStore, type TriggerStore } from '../core/storage/TriggerStore.js';
import { Tempo } from '../core/tempo/Tempo.js';
import { TriggerHandler } from '../apps/trigger/triggerHandler.js';
import { DebugHandler } from '../apps/debug/debugHandler.js';
import { ConsoleClient } from '../adapter/console/ConsoleClient.js';
import { ConsoleProducer } from '../adapter/console/ConsoleProducer.js';

export interface BotParts {
  cfg: AppConfig;
  logger: Logger;
  client: BotClient;
  store?: TriggerStore;
  tempo?: Tempo<string>;
}

/**
 * Wire middlewares and handlers into a dispatcher. Order matters: it is the
 * order in which every event is processed.
 */
export function createDispatcher({ cfg, logger, client, store, tempo }: BotParts): Dispatcher {
  const dispatcher = new Dispatcher(client, logger, {
    receiveTimeoutMs: cfg.bot.receiveTimeoutMs,
  });

  dispatcher
    .addMiddleware(new LoggingMiddleware(logger))
    .addMiddleware(new IgnoreSelf(logger, cfg.bot.userId))
    .addPostHandler(
      new MutexedHandler(
        new TriggerHandler({
          store: store ?? new InMemoryTriggerStore(),
          sender: client,
          tempo: tempo ?? new Tempo<string>(),
          logger,
          repeatDelayMs: cfg.bot.triggerRepeatDelayMs,
          channelRateLimitMs: cfg.bot.channelRateLimitMs,
        }),
      ),
    );

  if (cfg.bot.debugHandler) {
    dispatcher.addPostHandler(new DebugHandler(logger));
  }
  return dispatcher;
}

/**
 * Run the bot against the console backend until input ends.
 * Rejects with the fatal error that stopped the event loop.
 */
export async function start(): Promise<void> {
  const cfg = loadConfig();
  const logger = createLogger(cfg);
  logger.info('bootstrap', `Starting ${cfg.app.name} in ${cfg.app.env}`);

  const queue: EventQueue = createEventQueue();
  const client = new ConsoleClient(logger, cfg.bot.debugChannel);
  const dispatcher = createDispatcher({ cfg, logger, client });

  const producer = new ConsoleProducer(queue);
  const listening = producer.start(cfg.bot.userId);

  try {
    await dispatcher.run(queue);
    logger.info('bootstrap', 'Event loop stopped');
  } catch (err) {
    logger.error('bootstrap', `Fatal: ${errorMessage(err)}`);
    throw err;
  } finally {
    queue.close();
    producer.stop();
  }
  await listening;
}
