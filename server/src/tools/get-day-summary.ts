import type { UserStore } from '../store/user-store.js';
import { summarizeDay } from '../log/day-summary.js';
import type { DaySummary } from '../types.js';

interface GetDaySummaryDeps {
  users: UserStore;
}

interface GetDaySummaryParams {
  username: string;
  date: string;
  target?: number;
}

export function handleGetDaySummary(
  deps: GetDaySummaryDeps,
  params: GetDaySummaryParams,
): DaySummary {
  const entries = deps.users.getEntries(params.username, params.date);
  return summarizeDay(params.date, entries, params.target);
}
