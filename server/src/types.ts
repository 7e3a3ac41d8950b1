/** Result of resolving one free-text food phrase. */
export interface ResolvedItem {
  rawText: string;
  canonicalName: string;
  calorieEstimate: number;
}

/** A resolved item as stored in a user's day log. */
export interface LoggedEntry {
  raw: string;
  name: string;
  kcal: number;
}

/** Entries keyed by ISO calendar date (YYYY-MM-DD). */
export type EntriesByDate = Record<string, LoggedEntry[]>;

/** One account in the whole-store snapshot. */
export interface StoredUser {
  passwordHash: string;
  entries: EntriesByDate;
  remember: boolean;
}

/** Whole-store snapshot exchanged by UserStore.load() and UserStore.save(). */
export interface AppState {
  users: Record<string, StoredUser>;
}

/** Illustrative energy split of a day's total, in kcal. */
export interface MacroSplit {
  carbs: number;
  protein: number;
  fat: number;
}

/** Progress of a day's total against the chosen daily target. */
export interface TargetProgress {
  target: number;
  progress: number;
  percent: number;
}

/** Everything the dashboard shows for one date. */
export interface DaySummary {
  date: string;
  entries: LoggedEntry[];
  totalKcal: number;
  itemCount: number;
  macros: MacroSplit;
  target: TargetProgress;
  tips: string[];
  activities: string[];
}

/** Converts a resolver result into its stored form. */
export function toLoggedEntry(item: ResolvedItem): LoggedEntry {
  return {
    raw: item.rawText,
    name: item.canonicalName,
    kcal: Math.round(item.calorieEstimate),
  };
}
