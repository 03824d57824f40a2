import type { Connection, IncomingEnvelope, Message, OutgoingEnvelope } from './types.js';

export function createIncomingEnvelope(message: Message): IncomingEnvelope {
  return {
    connection: message.connection,
    text: message.text,
    receivedAt: message.createdAt,
    handled: false,
    responses: [],
    message,
  };
}

export function createOutgoingEnvelope(
  connection: Connection,
  text: string,
  options: { inResponseTo?: Message; params?: Record<string, string> } = {},
): OutgoingEnvelope {
  return {
    connection,
    text,
    params: { ...options.params },
    inResponseTo: options.inResponseTo,
  };
}

/**
 * Queue a reply to the sender of `envelope`. Replies go out in the order they
 * were queued once inbound dispatch has finished.
 */
export function respond(
  envelope: IncomingEnvelope,
  text: string,
  params?: Record<string, string>,
): OutgoingEnvelope {
  const reply = createOutgoingEnvelope(envelope.connection, text, {
    inResponseTo: envelope.message,
    params,
  });
  envelope.responses.push(reply);
  return reply;
}
