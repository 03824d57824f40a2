import { respond } from '../messages/envelope.js';
import type { IncomingEnvelope } from '../messages/types.js';
import { stringOption } from './options.js';
import type { Handler, HandlerContext } from './types.js';

/**
 * Replies with the incoming text. With a `keyword`, only text starting with
 * that word is answered, and the keyword is stripped from the reply.
 */
export class EchoHandler implements Handler {
  readonly name = 'echo';
  private prefix: string;
  private keyword: string;

  constructor(ctx: HandlerContext) {
    this.prefix = stringOption(ctx.config, 'prefix', '');
    this.keyword = stringOption(ctx.config, 'keyword', '').toLowerCase();
  }

  handle(envelope: IncomingEnvelope): boolean {
    let text = envelope.text.trim();

    if (this.keyword) {
      const [first, ...rest] = text.split(/\s+/);
      if (first.toLowerCase() !== this.keyword) return false;
      text = rest.join(' ');
    }

    respond(envelope, `${this.prefix}${text}`);
    return true;
  }
}
