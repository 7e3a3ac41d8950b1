import type { UserStore } from '../store/user-store.js';

interface ResetEntriesDeps {
  users: UserStore;
}

/** Deletes every logged entry of the user; the account itself stays. */
export function handleResetEntries(
  deps: ResetEntriesDeps,
  params: { username: string },
): { removed: number } {
  return { removed: deps.users.clearAll(params.username) };
}
