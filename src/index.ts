// Library entry point.

export { createApp, type App, type CreateAppOptions } from './app.js';
export { loadConfig, resolveConfig, DEFAULT_CONFIG, type AppConfig, type LoggingConfig } from './config.js';
export { createLogger } from './logger.js';

export { Router, type RouterConfig, type SendOptions, type FlushResult } from './router/router.js';
export { DispatchEngine, type DispatchEngineConfig } from './router/dispatch.js';
export { DeliveryClient, buildDeliveryUrl, type DeliveryClientConfig, type DeliveryOutcome } from './router/delivery.js';

export * from './handlers/types.js';
export { BUILTIN_HANDLERS, instantiateHandlers } from './handlers/registry.js';

export * from './messages/types.js';
export type { MessageStore, ConnectionResolver } from './messages/store.js';
export { SqliteMessageStore } from './messages/sqlite-store.js';
export { createIncomingEnvelope, createOutgoingEnvelope, respond } from './messages/envelope.js';
