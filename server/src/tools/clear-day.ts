import type { UserStore } from '../store/user-store.js';
import { summarizeDay } from '../log/day-summary.js';
import type { DaySummary } from '../types.js';

interface ClearDayDeps {
  users: UserStore;
}

interface ClearDayParams {
  username: string;
  date: string;
  target?: number;
}

interface ClearDayResponse {
  removed: number;
  summary: DaySummary;
}

/** Empties one date of the user's log. */
export function handleClearDay(
  deps: ClearDayDeps,
  params: ClearDayParams,
): ClearDayResponse {
  const removed = deps.users.clearDay(params.username, params.date);
  return {
    removed,
    summary: summarizeDay(params.date, [], params.target),
  };
}
