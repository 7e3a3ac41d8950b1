import type Database from 'better-sqlite3';
import type {
  AppState,
  EntriesByDate,
  LoggedEntry,
  StoredUser,
} from '../types.js';

/** An account as stored, without its entries. */
export interface UserRecord {
  username: string;
  passwordHash: string;
  remember: boolean;
  createdAt: number;
}

interface UserRow {
  username: string;
  password_hash: string;
  remember: number;
  created_at: number;
}

interface EntryRow {
  entry_date: string;
  raw_text: string;
  name: string;
  kcal: number;
}

interface EntryInsert {
  username: string;
  entry_date: string;
  raw_text: string;
  name: string;
  kcal: number;
  created_at: number;
}

function toEntry(row: EntryRow): LoggedEntry {
  return { raw: row.raw_text, name: row.name, kcal: row.kcal };
}

/** Groups date-ordered rows into entries keyed by date. */
function groupByDate(rows: EntryRow[]): EntriesByDate {
  const entries: EntriesByDate = {};
  for (const row of rows) {
    (entries[row.entry_date] ??= []).push(toEntry(row));
  }
  return entries;
}

/** SQLite-backed accounts and per-date food entries. */
export class UserStore {
  private stmts: {
    getUser: Database.Statement<[string], UserRow>;
    allUsers: Database.Statement<[], UserRow>;
    insertUser: Database.Statement<[string, string, number, number]>;
    setRemember: Database.Statement<[number, string]>;
    rememberedUsers: Database.Statement<[], { username: string }>;
    countUsers: Database.Statement<[], { count: number }>;
    insertEntry: Database.Statement<[EntryInsert]>;
    entriesForDate: Database.Statement<[string, string], EntryRow>;
    entriesForUser: Database.Statement<[string], EntryRow>;
    deleteDay: Database.Statement<[string, string]>;
    deleteAllEntries: Database.Statement<[string]>;
    deleteAllUsers: Database.Statement<[]>;
  };

  constructor(private readonly db: Database.Database) {
    this.stmts = {
      getUser: db.prepare<[string], UserRow>(
        'SELECT * FROM users WHERE username = ?',
      ),
      allUsers: db.prepare<[], UserRow>(
        'SELECT * FROM users ORDER BY created_at, username',
      ),
      insertUser: db.prepare<[string, string, number, number]>(
        `INSERT OR IGNORE INTO users (username, password_hash, remember, created_at)
         VALUES (?, ?, ?, ?)`,
      ),
      setRemember: db.prepare<[number, string]>(
        'UPDATE users SET remember = ? WHERE username = ?',
      ),
      rememberedUsers: db.prepare<[], { username: string }>(
        'SELECT username FROM users WHERE remember = 1 ORDER BY username',
      ),
      countUsers: db.prepare<[], { count: number }>(
        'SELECT COUNT(*) AS count FROM users',
      ),
      insertEntry: db.prepare<EntryInsert>(
        `INSERT INTO food_entries (username, entry_date, raw_text, name, kcal, created_at)
         VALUES (@username, @entry_date, @raw_text, @name, @kcal, @created_at)`,
      ),
      entriesForDate: db.prepare<[string, string], EntryRow>(
        `SELECT entry_date, raw_text, name, kcal FROM food_entries
         WHERE username = ? AND entry_date = ? ORDER BY id`,
      ),
      entriesForUser: db.prepare<[string], EntryRow>(
        `SELECT entry_date, raw_text, name, kcal FROM food_entries
         WHERE username = ? ORDER BY entry_date, id`,
      ),
      deleteDay: db.prepare<[string, string]>(
        'DELETE FROM food_entries WHERE username = ? AND entry_date = ?',
      ),
      deleteAllEntries: db.prepare<[string]>(
        'DELETE FROM food_entries WHERE username = ?',
      ),
      deleteAllUsers: db.prepare<[]>('DELETE FROM users'),
    };
  }

  getUser(username: string): UserRecord | null {
    const row = this.stmts.getUser.get(username);
    if (!row) {
      return null;
    }
    return {
      username: row.username,
      passwordHash: row.password_hash,
      remember: row.remember === 1,
      createdAt: row.created_at,
    };
  }

  /** Creates an account. Returns false when the username is taken. */
  createUser(username: string, passwordHash: string, remember = true): boolean {
    const now = Math.floor(Date.now() / 1000);
    const result = this.stmts.insertUser.run(
      username,
      passwordHash,
      remember ? 1 : 0,
      now,
    );
    return result.changes === 1;
  }

  setRemember(username: string, remember: boolean): void {
    this.stmts.setRemember.run(remember ? 1 : 0, username);
  }

  /** Usernames with the remember flag set, sorted. */
  rememberedUsers(): string[] {
    return this.stmts.rememberedUsers.all().map((row) => row.username);
  }

  countUsers(): number {
    return this.stmts.countUsers.get()?.count ?? 0;
  }

  /** Appends entries to a date in order, atomically. */
  appendEntries(username: string, date: string, entries: LoggedEntry[]): void {
    const now = Math.floor(Date.now() / 1000);
    const insertAll = this.db.transaction((items: LoggedEntry[]) => {
      for (const entry of items) {
        this.stmts.insertEntry.run({
          username,
          entry_date: date,
          raw_text: entry.raw,
          name: entry.name,
          kcal: entry.kcal,
          created_at: now,
        });
      }
    });
    insertAll(entries);
  }

  getEntries(username: string, date: string): LoggedEntry[] {
    return this.stmts.entriesForDate.all(username, date).map(toEntry);
  }

  getAllEntries(username: string): EntriesByDate {
    return groupByDate(this.stmts.entriesForUser.all(username));
  }

  /** Removes one date's entries. Returns how many were removed. */
  clearDay(username: string, date: string): number {
    return this.stmts.deleteDay.run(username, date).changes;
  }

  /** Removes every entry of the user. Returns how many were removed. */
  clearAll(username: string): number {
    return this.stmts.deleteAllEntries.run(username).changes;
  }

  /** Reads the whole store as one snapshot. */
  load(): AppState {
    const users: Record<string, StoredUser> = {};
    for (const row of this.stmts.allUsers.all()) {
      users[row.username] = {
        passwordHash: row.password_hash,
        entries: this.getAllEntries(row.username),
        remember: row.remember === 1,
      };
    }
    return { users };
  }

  /**
   * Replaces the whole store with `state` in one transaction. Existing
   * sessions go with their users; surviving users keep their creation
   * time. Failures are logged and reported as false.
   */
  save(state: AppState): boolean {
    const now = Math.floor(Date.now() / 1000);
    try {
      const replaceAll = this.db.transaction((next: AppState) => {
        const createdAt = new Map(
          this.stmts.allUsers
            .all()
            .map((row): [string, number] => [row.username, row.created_at]),
        );
        this.stmts.deleteAllUsers.run();
        for (const [username, user] of Object.entries(next.users)) {
          this.stmts.insertUser.run(
            username,
            user.passwordHash,
            user.remember ? 1 : 0,
            createdAt.get(username) ?? now,
          );
          for (const [date, entries] of Object.entries(user.entries)) {
            for (const entry of entries) {
              this.stmts.insertEntry.run({
                username,
                entry_date: date,
                raw_text: entry.raw,
                name: entry.name,
                kcal: entry.kcal,
                created_at: now,
              });
            }
          }
        }
      });
      replaceAll(state);
      return true;
    } catch (error) {
      console.error('Failed to save user store:', error);
      return false;
    }
  }
}
