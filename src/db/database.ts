import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';

export type SqliteDatabase = Database.Database;

/**
 * Open (or create) the session database and make sure the schema exists.
 * `:memory:` gives a throwaway database.
 */
export function openDatabase(dbPath: string): SqliteDatabase {
  if (dbPath !== ':memory:') {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  initSchema(db);

  if (dbPath !== ':memory:') {
    console.log(`📂 Session database: ${dbPath}`);
  }
  return db;
}

export function initSchema(db: SqliteDatabase): void {
  // 1. sessions: one row per conversation
  db.exec(`
    CREATE TABLE IF NOT EXISTS sessions (
      id TEXT PRIMARY KEY,
      name TEXT,
      endpoint TEXT NOT NULL,
      model TEXT NOT NULL,
      nsfw_mode INTEGER NOT NULL DEFAULT 0,
      safe_endpoint TEXT,
      prompt_tokens INTEGER NOT NULL DEFAULT 0,
      completion_tokens INTEGER NOT NULL DEFAULT 0,
      total_tokens INTEGER NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_sessions_updated_at ON sessions(updated_at);
  `);

  // 2. session_messages: ordered history, `position` is the insertion order
  db.exec(`
    CREATE TABLE IF NOT EXISTS session_messages (
      session_id TEXT NOT NULL,
      position INTEGER NOT NULL,
      role TEXT NOT NULL,
      content TEXT NOT NULL,
      tool_call_id TEXT,
      tool_calls TEXT,
      created_at TEXT NOT NULL,
      PRIMARY KEY (session_id, position),
      FOREIGN KEY (session_id) REFERENCES sessions(id) ON DELETE CASCADE
    );
  `);
}
