import type { ResolvedItem } from '../types.js';
import { SYNONYMS, type FoodCatalog, type PatternTable } from './catalog.js';
import { extractQuantity } from './quantity.js';
import { closestMatch } from './similarity.js';

const FUZZY_CUTOFF = 0.7;

const BASELINE_KCAL = 150;
const MIN_ESTIMATE_KCAL = 50;

/** Keyword groups of the generic estimator. Each group applies at most once. */
const ESTIMATE_ADJUSTMENTS: ReadonlyArray<{ keywords: string[]; delta: number }> = [
  { keywords: ['fried', 'deep fry', 'pakora', 'bhaji'], delta: 200 },
  { keywords: ['butter', 'cream', 'cheese', 'paneer', 'ghee'], delta: 150 },
  {
    keywords: ['sweet', 'dessert', 'sugar', 'syrup', 'jamun', 'jalebi', 'halwa', 'kheer'],
    delta: 180,
  },
  { keywords: ['grilled', 'boiled', 'steamed', 'salad', 'soup'], delta: -50 },
];

/** Lowercases, trims, and collapses whitespace. */
export function normalizePhrase(phrase: string): string {
  return phrase.trim().toLowerCase().replace(/\s+/g, ' ');
}

/** Per-serving kcal guess for a phrase that matched nothing in the catalog. */
export function estimatePerServing(phrase: string): number {
  const text = phrase.toLowerCase();
  let kcal = BASELINE_KCAL;
  for (const { keywords, delta } of ESTIMATE_ADJUSTMENTS) {
    if (keywords.some((keyword) => text.includes(keyword))) {
      kcal += delta;
    }
  }
  return Math.max(MIN_ESTIMATE_KCAL, kcal);
}

/** Turns free-text food phrases into catalog labels and calorie estimates. */
export class FoodResolver {
  constructor(
    private readonly catalog: FoodCatalog,
    private readonly synonyms: PatternTable = SYNONYMS,
  ) {}

  /** Whether `name` is a catalog label. */
  has(name: string): boolean {
    return this.catalog.has(name);
  }

  /**
   * Resolves a phrase to a name: first synonym contained in it, exact
   * catalog label, closest catalog label, or the normalized phrase itself.
   */
  normalizeFoodName(phrase: string): string {
    const normalized = normalizePhrase(phrase);

    for (const [pattern, canonical] of this.synonyms) {
      if (normalized.includes(pattern)) {
        return canonical;
      }
    }

    if (this.catalog.has(normalized)) {
      return normalized;
    }

    return (
      closestMatch(normalized, this.catalog.keys(), FUZZY_CUTOFF) ?? normalized
    );
  }

  resolve(phrase: string): ResolvedItem {
    const quantity = extractQuantity(phrase);
    const name = this.normalizeFoodName(phrase);
    const rawText = phrase.trim();

    const perServing = this.catalog.get(name);
    if (perServing !== undefined) {
      return {
        rawText,
        canonicalName: name,
        calorieEstimate: perServing * quantity,
      };
    }

    return {
      rawText,
      canonicalName: `${rawText} (estimated)`,
      calorieEstimate: estimatePerServing(phrase) * quantity,
    };
  }
}
