export type Direction = 'inbound' | 'outbound';

export type MessageStatus =
  | 'received'
  | 'handled'
  | 'pending'
  | 'sent'
  | 'queued'
  | 'cancelled';

export const MESSAGE_STATUSES: readonly MessageStatus[] = [
  'received', 'handled', 'pending', 'sent', 'queued', 'cancelled',
];

// Allowed next statuses. Terminal statuses map to an empty list.
export const STATUS_TRANSITIONS: Record<MessageStatus, readonly MessageStatus[]> = {
  received: ['handled'],
  handled: [],
  pending: ['sent', 'queued', 'cancelled'],
  queued: ['sent'],
  sent: [],
  cancelled: [],
};

export function isMessageStatus(value: unknown): value is MessageStatus {
  return typeof value === 'string' && (MESSAGE_STATUSES as readonly string[]).includes(value);
}

/**
 * Statuses a message may currently hold for an update to `next` to be accepted.
 * Rewriting the current status is a no-op, so `next` itself is included.
 */
export function allowedSources(next: MessageStatus): MessageStatus[] {
  return MESSAGE_STATUSES.filter(s => s === next || STATUS_TRANSITIONS[s].includes(next));
}

export interface Connection {
  id: number;
  /** Backend (carrier or channel) the identity belongs to */
  backend: string;
  /** Address on that backend, usually a phone number */
  identity: string;
}

export interface Message {
  id: number;
  connection: Connection;
  text: string;
  direction: Direction;
  status: MessageStatus;
  createdAt: Date;
  /** Id of the inbound message this one answers */
  inResponseTo: number | null;
}

export interface NewMessage {
  connection: Connection;
  text: string;
  direction: Direction;
  status: MessageStatus;
  inResponseTo?: Message | null;
}

/**
 * A reply or proactive message on its way out, before it is persisted.
 */
export interface OutgoingEnvelope {
  connection: Connection;
  text: string;
  /** Extra gateway parameters, substituted into the delivery URL */
  params: Record<string, string>;
  inResponseTo?: Message;
}

/**
 * In-flight view of an inbound message while the phase chain runs over it.
 */
export interface IncomingEnvelope {
  connection: Connection;
  text: string;
  receivedAt: Date;
  handled: boolean;
  responses: OutgoingEnvelope[];
  /** The persisted record backing this envelope */
  message: Message;
}
