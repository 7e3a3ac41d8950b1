import { QUANTITY_WORDS } from './catalog.js';

const DIGITS = /[0-9]+/;

/** Upper bound on a parsed count; keeps kcal products and day totals safe integers. */
export const MAX_QUANTITY = 1_000_000;

/** Matches `word` as a whole word, ignoring case. */
function containsWord(text: string, word: string): boolean {
  return new RegExp(`\\b${word}\\b`, 'i').test(text);
}

/**
 * Extracts the serving multiplier from a phrase. The first digit run wins
 * over number words ("two 3 roti" is 3); number words are tried in lexicon
 * order. Always between 1 and MAX_QUANTITY.
 */
export function extractQuantity(text: string): number {
  const digits = DIGITS.exec(text);
  if (digits) {
    return Math.min(MAX_QUANTITY, Math.max(1, parseInt(digits[0], 10)));
  }

  for (const [word, value] of QUANTITY_WORDS) {
    if (containsWord(text, word)) {
      return value;
    }
  }

  // No count given ("cup of dal"): one serving.
  return 1;
}
