import { existsSync, readFileSync } from 'node:fs';
import { z } from 'zod';
import type { AppState } from '../types.js';
import { isIsoDate } from '../log/dates.js';
import type { UserStore } from './user-store.js';

const LegacyEntrySchema = z.object({
  raw: z.string(),
  name: z.string(),
  kcal: z.number().nonnegative().transform((kcal) => Math.round(kcal)),
});

const LegacyUserSchema = z.object({
  pw: z.string().default(''),
  entries: z
    .record(z.string().refine(isIsoDate), z.array(LegacyEntrySchema))
    .default({}),
  remember: z.boolean().default(false),
});

/** The flat JSON file the first version of the app kept all users in. */
export const LegacyDbSchema = z.object({
  users: z.record(LegacyUserSchema).default({}),
});

export type LegacyDb = z.infer<typeof LegacyDbSchema>;

/** Maps the flat-file layout onto the store snapshot. Password hashes carry over as-is. */
export function fromLegacy(legacy: LegacyDb): AppState {
  const state: AppState = { users: {} };
  for (const [username, user] of Object.entries(legacy.users)) {
    state.users[username] = {
      passwordHash: user.pw,
      entries: user.entries,
      remember: user.remember,
    };
  }
  return state;
}

export type LegacyImportResult =
  | { imported: true; users: number }
  | { imported: false; reason: string };

/**
 * Seeds an empty store from a legacy JSON file. Never throws: a missing,
 * unreadable or malformed file is logged and skipped.
 */
export function importLegacyFile(
  store: UserStore,
  filePath: string,
): LegacyImportResult {
  if (store.countUsers() > 0) {
    return { imported: false, reason: 'store already has users' };
  }
  if (!existsSync(filePath)) {
    console.warn(`Legacy data file not found: ${filePath}`);
    return { imported: false, reason: 'file not found' };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    console.error(`Could not read legacy data file ${filePath}:`, error);
    return { imported: false, reason: 'unreadable file' };
  }

  const parsed = LegacyDbSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.join('.') || '(root)';
    console.error(`Legacy data file ${filePath} is malformed at ${where}: ${issue.message}`);
    return { imported: false, reason: 'malformed file' };
  }

  const state = fromLegacy(parsed.data);
  if (!store.save(state)) {
    return { imported: false, reason: 'save failed' };
  }

  const users = Object.keys(state.users).length;
  console.warn(`Imported ${users} user(s) from ${filePath}`);
  return { imported: true, users };
}
