import { readFileSync } from 'node:fs';
import { z } from 'zod';

/** Immutable ordered mapping from canonical label to kcal per serving. */
export type FoodCatalog = ReadonlyMap<string, number>;

/** Ordered (pattern, result) pairs; the first pattern contained in a phrase wins. */
export type PatternTable = ReadonlyArray<readonly [string, string]>;

const DEFAULT_CATALOG_URL = new URL(
  '../../data/food-catalog.json',
  import.meta.url,
);

const CatalogFileSchema = z.object({
  foods: z
    .array(
      z.object({
        name: z.string().min(1),
        kcal: z.number().int().nonnegative(),
      }),
    )
    .min(1),
});

/**
 * Informal phrase fragments mapped to canonical labels. Order matters:
 * "chapathi" shadows "chapathi roti", and "tea" also matches inside
 * "steamed".
 */
export const SYNONYMS: PatternTable = [
  ['chapathi', 'chapati'],
  ['chapathi roti', 'roti'],
  ['parantha', 'paratha'],
  ['tea', 'chai'],
  ['coffee', 'coffee'],
  ['paneer butter', 'paneer butter masala (1 cup)'],
  ['butter paneer', 'paneer butter masala (1 cup)'],
  ['chicken biryani', 'biryani (1 plate)'],
  ['veg biryani', 'biryani (1 plate)'],
  ['curd', 'yogurt (1 cup)'],
  ['dahi', 'yogurt (1 cup)'],
  ['bhaji', 'pav bhaji (1 plate)'],
  ['fried potatoes', 'fries (medium)'],
  ['french fries', 'fries (medium)'],
  ['omelet', 'omelette (2 eggs)'],
  ['maggi noodles', 'maggi (1 packet)'],
];

/** Spelled-out quantities, searched in this order. */
export const QUANTITY_WORDS: ReadonlyArray<readonly [string, number]> = [
  ['one', 1],
  ['two', 2],
  ['three', 3],
  ['four', 4],
  ['five', 5],
  ['six', 6],
  ['seven', 7],
  ['eight', 8],
  ['nine', 9],
  ['ten', 10],
  ['a', 1],
  ['an', 1],
];

/** Builds a catalog from parsed file contents, rejecting duplicate labels. */
export function parseCatalog(raw: unknown): FoodCatalog {
  const parsed = CatalogFileSchema.parse(raw);
  const catalog = new Map<string, number>();
  for (const food of parsed.foods) {
    if (catalog.has(food.name)) {
      throw new Error(`Duplicate catalog label: "${food.name}"`);
    }
    catalog.set(food.name, food.kcal);
  }
  return catalog;
}

/** Reads and validates the food catalog JSON file. */
export function loadCatalog(source: URL | string = DEFAULT_CATALOG_URL): FoodCatalog {
  const raw: unknown = JSON.parse(readFileSync(source, 'utf-8'));
  return parseCatalog(raw);
}
