import type { Logger } from 'winston';
import type { IncomingEnvelope } from '../messages/types.js';
import { stringListOption } from './options.js';
import type { Handler, HandlerContext } from './types.js';

export class BlacklistHandler implements Handler {
  readonly name = 'blacklist';
  private senders: Set<string>;
  private logger: Logger;

  constructor(ctx: HandlerContext) {
    this.senders = new Set(stringListOption(ctx.config, 'senders'));
    this.logger = ctx.logger;
  }

  filter(envelope: IncomingEnvelope): boolean {
    if (!this.senders.has(envelope.connection.identity)) return false;
    this.logger.info('Dropping message from blacklisted sender', {
      backend: envelope.connection.backend,
      sender: envelope.connection.identity,
    });
    return true;
  }
}
