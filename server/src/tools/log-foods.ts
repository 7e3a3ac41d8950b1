import type { FoodResolver } from '../resolver/resolve.js';
import type { UserStore } from '../store/user-store.js';
import { splitPhrases, summarizeDay } from '../log/day-summary.js';
import { toLoggedEntry, type DaySummary, type LoggedEntry } from '../types.js';

interface LogFoodsDeps {
  users: UserStore;
  resolver: FoodResolver;
}

interface LogFoodsParams {
  username: string;
  date: string;
  text: string;
  target?: number;
}

interface LogFoodsResponse {
  added: LoggedEntry[];
  summary: DaySummary;
}

/** Resolves every phrase of a meal box, in order, and appends the results to the date. */
export function handleLogFoods(
  deps: LogFoodsDeps,
  params: LogFoodsParams,
): LogFoodsResponse {
  const added = splitPhrases(params.text).map((phrase) =>
    toLoggedEntry(deps.resolver.resolve(phrase)),
  );

  if (added.length > 0) {
    deps.users.appendEntries(params.username, params.date, added);
  }

  const entries = deps.users.getEntries(params.username, params.date);
  return {
    added,
    summary: summarizeDay(params.date, entries, params.target),
  };
}
