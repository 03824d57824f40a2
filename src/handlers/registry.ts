import type { Handler, HandlerContext, HandlerEntry, HandlerRegistry, RouterHandle } from './types.js';
import type { Logger } from 'winston';

export const BUILTIN_HANDLERS: HandlerRegistry = {
  'blacklist':     (ctx) => import('./blacklist.js').then(m => new m.BlacklistHandler(ctx)),
  'message-log':   (ctx) => import('./message-log.js').then(m => new m.MessageLogHandler(ctx)),
  'echo':          (ctx) => import('./echo.js').then(m => new m.EchoHandler(ctx)),
  'default-reply': (ctx) => import('./default-reply.js').then(m => new m.DefaultReplyHandler(ctx)),
};

/**
 * Instantiate the configured handlers, in configuration order. Unknown names
 * fail loudly instead of being skipped.
 */
export async function instantiateHandlers(
  entries: HandlerEntry[],
  registry: HandlerRegistry,
  base: { router: RouterHandle; logger: Logger },
): Promise<Handler[]> {
  const handlers: Handler[] = [];

  for (const entry of entries) {
    const factory = Object.hasOwn(registry, entry.name) ? registry[entry.name] : undefined;
    if (!factory) {
      throw new Error(`Unknown handler: ${entry.name}`);
    }

    const ctx: HandlerContext = {
      router: base.router,
      logger: base.logger.child({ handler: entry.name }),
      config: entry,
    };
    handlers.push(await factory(ctx));
    base.logger.debug('Handler registered', { handler: entry.name });
  }

  return handlers;
}
