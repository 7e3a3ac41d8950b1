import type { UserStore } from '../store/user-store.js';
import type { EntriesByDate } from '../types.js';

interface ExportDataDeps {
  users: UserStore;
}

interface ExportDataResponse {
  username: string;
  remember: boolean;
  entries: EntriesByDate;
}

/** The caller's account flag and every logged entry. The password hash is left out. */
export function handleExportData(
  deps: ExportDataDeps,
  params: { username: string },
): ExportDataResponse {
  const user = deps.users.getUser(params.username);
  if (!user) {
    throw new Error(`Unknown user: ${params.username}`);
  }
  return {
    username: user.username,
    remember: user.remember,
    entries: deps.users.getAllEntries(user.username),
  };
}
