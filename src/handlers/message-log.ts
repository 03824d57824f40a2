import type { Logger } from 'winston';
import type { IncomingEnvelope, OutgoingEnvelope } from '../messages/types.js';
import type { Handler, HandlerContext } from './types.js';

export class MessageLogHandler implements Handler {
  readonly name = 'message-log';
  private logger: Logger;

  constructor(ctx: HandlerContext) {
    this.logger = ctx.logger;
  }

  parse(envelope: IncomingEnvelope): void {
    this.logger.info('Inbound message', {
      id: envelope.message.id,
      backend: envelope.connection.backend,
      sender: envelope.connection.identity,
      text: envelope.text,
    });
  }

  outgoing(envelope: OutgoingEnvelope): boolean {
    this.logger.info('Outbound message', {
      backend: envelope.connection.backend,
      recipient: envelope.connection.identity,
      text: envelope.text,
      inResponseTo: envelope.inResponseTo?.id ?? null,
    });
    return true;
  }
}
