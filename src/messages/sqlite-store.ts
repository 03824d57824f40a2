// src/messages/sqlite-store.ts
// better-sqlite3 backed message and connection persistence.
import type Database from 'better-sqlite3';
import { runMigrations } from './migrations.js';
import type { ConnectionResolver, MessageStore } from './store.js';
import {
  allowedSources,
  isMessageStatus,
  type Connection,
  type Direction,
  type Message,
  type MessageStatus,
  type NewMessage,
} from './types.js';

interface ConnectionRow {
  id: number;
  backend: string;
  identity: string;
}

interface MessageRow {
  id: number;
  text: string;
  direction: string;
  status: string;
  created_at: string;
  in_response_to: number | null;
  connection_id: number;
  backend: string;
  identity: string;
}

const SELECT_MESSAGE = `
  SELECT m.id, m.text, m.direction, m.status, m.created_at, m.in_response_to,
         c.id AS connection_id, c.backend, c.identity
  FROM messages m
  JOIN connections c ON c.id = m.connection_id
`;

function toDirection(value: string): Direction {
  if (value === 'inbound' || value === 'outbound') return value;
  throw new Error(`Unknown message direction: ${value}`);
}

function toMessage(row: MessageRow): Message {
  if (!isMessageStatus(row.status)) {
    throw new Error(`Unknown message status: ${row.status}`);
  }
  return {
    id: row.id,
    connection: { id: row.connection_id, backend: row.backend, identity: row.identity },
    text: row.text,
    direction: toDirection(row.direction),
    status: row.status,
    createdAt: new Date(row.created_at),
    inResponseTo: row.in_response_to,
  };
}

export class SqliteMessageStore implements MessageStore, ConnectionResolver {
  private db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
    runMigrations(this.db);
  }

  async getOrCreate(backend: string, identity: string): Promise<Connection> {
    this.db.prepare<[string, string]>(
      'INSERT OR IGNORE INTO connections (backend, identity) VALUES (?, ?)'
    ).run(backend, identity);

    const row = this.db.prepare<[string, string], ConnectionRow>(
      'SELECT id, backend, identity FROM connections WHERE backend = ? AND identity = ?'
    ).get(backend, identity);
    if (!row) {
      throw new Error(`Connection not persisted: ${backend}/${identity}`);
    }
    return { id: row.id, backend: row.backend, identity: row.identity };
  }

  async createMessage(input: NewMessage): Promise<Message> {
    const result = this.db.prepare<[number, string, string, string, string, number | null]>(
      `INSERT INTO messages (connection_id, text, direction, status, created_at, in_response_to)
       VALUES (?, ?, ?, ?, ?, ?)`
    ).run(
      input.connection.id,
      input.text,
      input.direction,
      input.status,
      new Date().toISOString(),
      input.inResponseTo?.id ?? null,
    );

    return this.requireMessage(Number(result.lastInsertRowid));
  }

  async updateStatus(messageId: number, status: MessageStatus): Promise<Message> {
    const sources = allowedSources(status);
    const placeholders = sources.map(() => '?').join(', ');

    const apply = this.db.transaction((): Message => {
      const result = this.db.prepare<[string, number, ...string[]]>(
        `UPDATE messages SET status = ? WHERE id = ? AND status IN (${placeholders})`
      ).run(status, messageId, ...sources);

      const current = this.requireMessage(messageId);
      if (result.changes === 0) {
        throw new Error(`Invalid status transition for message ${messageId}: ${current.status} -> ${status}`);
      }
      return current;
    });

    return apply();
  }

  async findByStatus(status: MessageStatus): Promise<Message[]> {
    const rows = this.db.prepare<[string], MessageRow>(
      `${SELECT_MESSAGE} WHERE m.status = ? ORDER BY m.id ASC`
    ).all(status);
    return rows.map(toMessage);
  }

  /** Messages sent in response to `messageId`, in creation order. */
  async findResponses(messageId: number): Promise<Message[]> {
    const rows = this.db.prepare<[number], MessageRow>(
      `${SELECT_MESSAGE} WHERE m.in_response_to = ? ORDER BY m.id ASC`
    ).all(messageId);
    return rows.map(toMessage);
  }

  async getMessage(messageId: number): Promise<Message | null> {
    const row = this.db.prepare<[number], MessageRow>(
      `${SELECT_MESSAGE} WHERE m.id = ?`
    ).get(messageId);
    return row ? toMessage(row) : null;
  }

  private requireMessage(messageId: number): Message {
    const row = this.db.prepare<[number], MessageRow>(
      `${SELECT_MESSAGE} WHERE m.id = ?`
    ).get(messageId);
    if (!row) {
      throw new Error(`Message not found: ${messageId}`);
    }
    return toMessage(row);
  }
}
