import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { QUANTITY_WORDS, SYNONYMS, loadCatalog, parseCatalog } from '../catalog.js';

describe('loadCatalog', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'catalog-test-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('loads the bundled catalog in file order', () => {
    const catalog = loadCatalog();

    expect(catalog.size).toBe(63);
    expect([...catalog.keys()].slice(0, 3)).toEqual(['roti', 'chapati', 'paratha']);
    expect(catalog.get('biryani (1 plate)')).toBe(550);
    expect(catalog.get('salad (1 bowl)')).toBe(120);
  });

  it('keeps labels exactly as written', () => {
    expect(loadCatalog().get('dosa (1):')).toBe(180);
  });

  it('reads a catalog from a file path', () => {
    const file = join(dir, 'foods.json');
    writeFileSync(file, JSON.stringify({ foods: [{ name: 'idiyappam', kcal: 90 }] }));

    const catalog = loadCatalog(file);

    expect([...catalog.entries()]).toEqual([['idiyappam', 90]]);
  });
});

describe('parseCatalog', () => {
  it('rejects duplicate labels', () => {
    expect(() =>
      parseCatalog({
        foods: [
          { name: 'roti', kcal: 80 },
          { name: 'roti', kcal: 90 },
        ],
      }),
    ).toThrow('Duplicate catalog label: "roti"');
  });

  it('rejects negative and fractional kcal', () => {
    expect(() => parseCatalog({ foods: [{ name: 'roti', kcal: -1 }] })).toThrow();
    expect(() => parseCatalog({ foods: [{ name: 'roti', kcal: 80.5 }] })).toThrow();
  });

  it('rejects an empty catalog', () => {
    expect(() => parseCatalog({ foods: [] })).toThrow();
  });
});

describe('lookup tables', () => {
  it('points every synonym at a catalog label, except the bare drink names', () => {
    const catalog = loadCatalog();
    const unlisted = SYNONYMS.map(([, canonical]) => canonical).filter(
      (name) => !catalog.has(name),
    );

    expect(unlisted).toEqual(['chai', 'coffee']);
  });

  it('lists number words before articles', () => {
    expect(QUANTITY_WORDS.map(([word]) => word)).toEqual([
      'one', 'two', 'three', 'four', 'five', 'six', 'seven', 'eight', 'nine', 'ten', 'a', 'an',
    ]);
  });
});
