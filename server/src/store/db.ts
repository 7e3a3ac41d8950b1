import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

export const DEFAULT_DB_PATH = './data/calorie-log.db';

/** Creates the schema in the given database. Idempotent. */
export function initializeSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS users (
      username      TEXT PRIMARY KEY,
      password_hash TEXT NOT NULL,
      remember      INTEGER NOT NULL DEFAULT 0,
      created_at    INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS food_entries (
      id         INTEGER PRIMARY KEY AUTOINCREMENT,
      username   TEXT NOT NULL REFERENCES users(username) ON DELETE CASCADE,
      entry_date TEXT NOT NULL,
      raw_text   TEXT NOT NULL,
      name       TEXT NOT NULL,
      kcal       INTEGER NOT NULL,
      created_at INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_food_entries_user_date
      ON food_entries(username, entry_date);

    CREATE TABLE IF NOT EXISTS sessions (
      token      TEXT PRIMARY KEY,
      username   TEXT NOT NULL REFERENCES users(username) ON DELETE CASCADE,
      remember   INTEGER NOT NULL DEFAULT 0,
      expires_at INTEGER NOT NULL,
      created_at INTEGER NOT NULL,
      revoked    INTEGER NOT NULL DEFAULT 0
    );

    CREATE INDEX IF NOT EXISTS idx_sessions_username ON sessions(username);
  `);
}

/**
 * Opens (or creates) the SQLite database, enables WAL and foreign keys, and
 * creates tables. Pass ":memory:" for a throwaway database.
 */
export function openDatabase(dbPath: string = DEFAULT_DB_PATH): Database.Database {
  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  initializeSchema(db);
  return db;
}
