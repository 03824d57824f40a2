import type { Connection, Message, MessageStatus, NewMessage } from './types.js';

/**
 * Persistence for message records. Implementations must make each create and
 * status update atomic per record; concurrent dispatches share one store.
 */
export interface MessageStore {
  createMessage(input: NewMessage): Promise<Message>;
  /** Rejects unknown ids and transitions the status lifecycle does not allow. */
  updateStatus(messageId: number, status: MessageStatus): Promise<Message>;
  /** Oldest first. */
  findByStatus(status: MessageStatus): Promise<Message[]>;
  getMessage(messageId: number): Promise<Message | null>;
}

export interface ConnectionResolver {
  /** Idempotent: the same (backend, identity) always yields the same connection. */
  getOrCreate(backend: string, identity: string): Promise<Connection>;
}
