import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import { openDatabase } from '../../store/db.js';
import { UserStore } from '../../store/user-store.js';
import { handleClearDay } from '../clear-day.js';
import { handleResetEntries } from '../reset-entries.js';
import { handleExportData } from '../export-data.js';

let db: Database.Database;
let users: UserStore;

const roti = { raw: '2 roti', name: 'roti', kcal: 160 };
const samosa = { raw: 'samosa', name: 'samosa (1)', kcal: 250 };

beforeEach(() => {
  db = openDatabase(':memory:');
  users = new UserStore(db);
  users.createUser('asha', 'hash');
  users.appendEntries('asha', '2024-05-01', [roti, samosa]);
  users.appendEntries('asha', '2024-05-02', [roti]);
});

afterEach(() => {
  db.close();
});

describe('handleClearDay', () => {
  it('empties one date and returns its empty summary', () => {
    const result = handleClearDay({ users }, { username: 'asha', date: '2024-05-01' });

    expect(result.removed).toBe(2);
    expect(result.summary.date).toBe('2024-05-01');
    expect(result.summary.totalKcal).toBe(0);
    expect(users.getEntries('asha', '2024-05-02')).toEqual([roti]);
  });

  it('removes nothing from an empty date', () => {
    expect(handleClearDay({ users }, { username: 'asha', date: '2024-06-01' }).removed).toBe(0);
  });
});

describe('handleResetEntries', () => {
  it('removes every entry and keeps the account', () => {
    expect(handleResetEntries({ users }, { username: 'asha' })).toEqual({ removed: 3 });
    expect(users.getAllEntries('asha')).toEqual({});
    expect(users.getUser('asha')).not.toBeNull();
  });
});

describe('handleExportData', () => {
  it('returns the user entries without the password hash', () => {
    expect(handleExportData({ users }, { username: 'asha' })).toEqual({
      username: 'asha',
      remember: true,
      entries: {
        '2024-05-01': [roti, samosa],
        '2024-05-02': [roti],
      },
    });
  });

  it('leaves other users out', () => {
    users.createUser('ravi', 'hash', false);
    users.appendEntries('ravi', '2024-05-01', [samosa]);

    expect(handleExportData({ users }, { username: 'ravi' })).toEqual({
      username: 'ravi',
      remember: false,
      entries: { '2024-05-01': [samosa] },
    });
  });

  it('throws for an unknown user', () => {
    expect(() => handleExportData({ users }, { username: 'nobody' })).toThrow(
      'Unknown user: nobody',
    );
  });
});
