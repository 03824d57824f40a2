import type Database from 'better-sqlite3';

export function runMigrations(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS connections (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      backend TEXT NOT NULL,
      identity TEXT NOT NULL,
      UNIQUE (backend, identity)
    );

    CREATE TABLE IF NOT EXISTS messages (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      connection_id INTEGER NOT NULL REFERENCES connections(id),
      text TEXT NOT NULL,
      direction TEXT NOT NULL,
      status TEXT NOT NULL,
      created_at TEXT NOT NULL,
      in_response_to INTEGER REFERENCES messages(id)
    );

    CREATE INDEX IF NOT EXISTS idx_messages_status ON messages(status);
    CREATE INDEX IF NOT EXISTS idx_messages_connection ON messages(connection_id);
  `);
}
