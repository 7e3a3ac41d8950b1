import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createHash } from 'node:crypto';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import type Database from 'better-sqlite3';
import { openDatabase } from '../db.js';
import { UserStore } from '../user-store.js';
import { LegacyDbSchema, fromLegacy, importLegacyFile } from '../legacy-import.js';

let db: Database.Database;
let store: UserStore;
let dir: string;

beforeEach(() => {
  db = openDatabase(':memory:');
  store = new UserStore(db);
  dir = mkdtempSync(join(tmpdir(), 'legacy-import-test-'));
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
  db.close();
  rmSync(dir, { recursive: true, force: true });
});

const legacyHash = createHash('sha256').update('test-secret').digest('hex');

function writeLegacy(contents: unknown): string {
  const file = join(dir, 'db.json');
  writeFileSync(file, typeof contents === 'string' ? contents : JSON.stringify(contents));
  return file;
}

describe('fromLegacy', () => {
  it('fills in missing fields and rounds kcal', () => {
    const legacy = LegacyDbSchema.parse({
      users: {
        asha: { pw: legacyHash, entries: { '2024-05-01': [{ raw: 'dal', name: 'dal (1 cup)', kcal: 180.4 }] } },
        ravi: {},
      },
    });

    expect(fromLegacy(legacy)).toEqual({
      users: {
        asha: {
          passwordHash: legacyHash,
          remember: false,
          entries: { '2024-05-01': [{ raw: 'dal', name: 'dal (1 cup)', kcal: 180 }] },
        },
        ravi: { passwordHash: '', remember: false, entries: {} },
      },
    });
  });
});

describe('importLegacyFile', () => {
  it('imports users and entries into an empty store', () => {
    const file = writeLegacy({
      users: {
        asha: {
          pw: legacyHash,
          remember: true,
          entries: { '2024-05-01': [{ raw: '2 roti', name: 'roti', kcal: 160 }] },
        },
      },
    });

    expect(importLegacyFile(store, file)).toEqual({ imported: true, users: 1 });
    expect(store.load()).toEqual({
      users: {
        asha: {
          passwordHash: legacyHash,
          remember: true,
          entries: { '2024-05-01': [{ raw: '2 roti', name: 'roti', kcal: 160 }] },
        },
      },
    });
    expect(console.warn).toHaveBeenCalledWith(`Imported 1 user(s) from ${file}`);
  });

  it('leaves a store that already has users alone', () => {
    store.createUser('ravi', 'hash');
    const file = writeLegacy({ users: { asha: { pw: legacyHash } } });

    expect(importLegacyFile(store, file)).toEqual({
      imported: false,
      reason: 'store already has users',
    });
    expect(store.getUser('asha')).toBeNull();
  });

  it('skips a missing file', () => {
    const file = join(dir, 'missing.json');

    expect(importLegacyFile(store, file)).toEqual({ imported: false, reason: 'file not found' });
    expect(console.warn).toHaveBeenCalledWith(`Legacy data file not found: ${file}`);
  });

  it('skips a file that is not JSON', () => {
    const file = writeLegacy('{not json');

    expect(importLegacyFile(store, file)).toEqual({ imported: false, reason: 'unreadable file' });
    expect(store.countUsers()).toBe(0);
  });

  it('skips a file with the wrong shape', () => {
    const file = writeLegacy({
      users: { asha: { pw: legacyHash, entries: { 'May 1st': [] } } },
    });

    expect(importLegacyFile(store, file)).toEqual({ imported: false, reason: 'malformed file' });
    expect(store.countUsers()).toBe(0);
  });

  it('treats a file without users as an empty import', () => {
    const file = writeLegacy({});

    expect(importLegacyFile(store, file)).toEqual({ imported: true, users: 0 });
  });
});
