import { respond } from '../messages/envelope.js';
import type { IncomingEnvelope } from '../messages/types.js';
import { stringOption } from './options.js';
import type { Handler, HandlerContext } from './types.js';

// Answers anything no other handler claimed.
export class DefaultReplyHandler implements Handler {
  readonly name = 'default-reply';
  private text: string;

  constructor(ctx: HandlerContext) {
    this.text = stringOption(ctx.config, 'text', 'Sorry, we did not understand your message.');
  }

  default(envelope: IncomingEnvelope): boolean {
    respond(envelope, this.text);
    return true;
  }
}
