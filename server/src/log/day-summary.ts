import { z } from 'zod';
import type { DaySummary, LoggedEntry, MacroSplit, TargetProgress } from '../types.js';
import { activitySuggestions, generateAlternatives } from '../suggestions/suggestions.js';

export const DEFAULT_TARGET_KCAL = 2000;

/** Daily target: 1500–3000 kcal in steps of 100. */
export const targetSchema = z.coerce
  .number()
  .int()
  .min(1500)
  .max(3000)
  .multipleOf(100);

/** Splits a meal box into phrases on commas and line breaks, dropping blanks. */
export function splitPhrases(text: string): string[] {
  return text.split(/[,\r\n]+/).filter((phrase) => phrase.trim() !== '');
}

/** Rough 50/20/30 carbs/protein/fat split, for display only. */
export function macroSplit(totalKcal: number): MacroSplit {
  return {
    carbs: Math.trunc(totalKcal * 0.5),
    protein: Math.trunc(totalKcal * 0.2),
    fat: Math.trunc(totalKcal * 0.3),
  };
}

export function targetProgress(totalKcal: number, target: number): TargetProgress {
  const progress = target > 0 ? Math.min(1, totalKcal / target) : 0;
  return { target, progress, percent: Math.trunc(progress * 100) };
}

/** Totals, macro split, target progress, and suggestions for one date's entries. */
export function summarizeDay(
  date: string,
  entries: LoggedEntry[],
  target: number = DEFAULT_TARGET_KCAL,
): DaySummary {
  const totalKcal = entries.reduce((sum, entry) => sum + entry.kcal, 0);

  return {
    date,
    entries,
    totalKcal,
    itemCount: entries.length,
    macros: macroSplit(totalKcal),
    target: targetProgress(totalKcal, target),
    tips: generateAlternatives(entries.map((entry) => entry.name)),
    activities: activitySuggestions(totalKcal),
  };
}
