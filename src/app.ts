import * as fs from 'fs';
import * as path from 'path';
import Database from 'better-sqlite3';
import type { Logger } from 'winston';
import type { AppConfig } from './config.js';
import { createLogger } from './logger.js';
import { SqliteMessageStore } from './messages/sqlite-store.js';
import { BUILTIN_HANDLERS } from './handlers/registry.js';
import type { HandlerRegistry } from './handlers/types.js';
import { DeliveryClient } from './router/delivery.js';
import { Router } from './router/router.js';

export interface App {
  router: Router;
  store: SqliteMessageStore;
  logger: Logger;
  close(): void;
}

export interface CreateAppOptions {
  logger?: Logger;
  /** Extra handler factories, merged over the built-in ones */
  handlers?: HandlerRegistry;
}

/**
 * Wire a router from configuration. The router is not started here; it
 * starts on first use.
 */
export function createApp(config: AppConfig, options: CreateAppOptions = {}): App {
  const logger = options.logger ?? createLogger(config.logging);

  if (config.database.path !== ':memory:') {
    fs.mkdirSync(path.dirname(config.database.path), { recursive: true });
  }
  const db = new Database(config.database.path);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');

  const store = new SqliteMessageStore(db);
  const delivery = new DeliveryClient({
    url: config.delivery.url,
    timeoutMs: config.delivery.timeoutMs,
    logger,
  });

  const router = new Router({
    store,
    connections: store,
    delivery,
    registry: { ...BUILTIN_HANDLERS, ...options.handlers },
    handlers: config.handlers,
    logger,
  });

  return {
    router,
    store,
    logger,
    close: () => db.close(),
  };
}
