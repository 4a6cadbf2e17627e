export { Dispatcher, DEFAULT_RECEIVE_TIMEOUT_MS, type DispatcherOptions } from './core/dispatcher/dispatcher.js';
export type { Handler } from './core/dispatcher/IHandler.js';
export { HandlerRegistry, type PostHandler } from './core/dispatcher/handlerRegistry.js';
export { MutexedHandler } from './core/dispatcher/MutexedHandler.js';
export { processHelp, HELP_NOT_FOUND } from './core/dispatcher/help.js';
export { Continue, type Middleware } from './core/dispatcher/middleware/types.js';
export { IgnoreSelf } from './core/dispatcher/middleware/ignoreSelf.js';
export { LoggingMiddleware } from './core/dispatcher/middleware/loggingMiddleware.js';
export * from './core/errors.js';
export type { MessageSender, Notifier, BotClient } from './core/messaging/MessageSender.js';
export * from './core/model/Event.js';
export * from './core/model/Post.js';
export {
  StatusCode,
  noneStatusError,
  type Status,
  type StatusError as StatusErrorBody,
} from './core/model/Status.js';
export type { Trigger } from './core/model/Trigger.js';
export { AsyncQueue, createEventQueue, type EventQueue, type ReceiveResult } from './core/queue/EventQueue.js';
export { InMemoryTriggerStore, type TriggerStore } from './core/storage/TriggerStore.js';
export { Tempo, type TempoOptions, type Clock } from './core/tempo/Tempo.js';
export { TriggerHandler, ACK_EMOJI, type TriggerHandlerOptions } from './apps/trigger/triggerHandler.js';
export { validMatch, compileTrigger, type CompiledTrigger } from './apps/trigger/match.js';
export { DebugHandler } from './apps/debug/debugHandler.js';
export { loadConfig, type AppConfig } from './infra/config/config.js';
export { createLogger, type Logger, type LogLevel } from './infra/logger/logger.js';
