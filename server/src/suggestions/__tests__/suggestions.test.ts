import { describe, it, expect } from 'vitest';
import {
  BASE_ACTIVITIES,
  GENERIC_TIPS,
  HIGH_INTAKE_ACTIVITY,
  activitySuggestions,
  generateAlternatives,
} from '../suggestions.js';

const PARATHA_TIP =
  'Swap paratha with chapati/roti 🫓 to cut oil and save ~80–100 kcal per piece.';
const BIRYANI_TIP =
  'Try veg pulao 🍚 or smaller portion biryani; pair with salad to fill up.';
const FRIES_TIP = 'Baked sweet potato wedges 🍠 or roasted chana.';

describe('generateAlternatives', () => {
  it('returns only the generic tips for no foods', () => {
    expect(generateAlternatives([])).toEqual([...GENERIC_TIPS]);
  });

  it('puts food-specific tips before the generic ones', () => {
    expect(generateAlternatives(['paratha'])).toEqual([PARATHA_TIP, ...GENERIC_TIPS]);
  });

  it('keeps first-seen order and drops duplicates', () => {
    expect(
      generateAlternatives(['paratha', 'paratha', 'biryani (1 plate)', 'fries (medium)']),
    ).toEqual([PARATHA_TIP, BIRYANI_TIP, FRIES_TIP, ...GENERIC_TIPS]);
  });

  it('matches fragments regardless of case', () => {
    expect(generateAlternatives(['Paneer Butter Masala (1 cup)'])[0]).toBe(
      'Choose kadai paneer 🌶️ or palak paneer; ask for less butter/ghee.',
    );
  });

  it('matches estimated names too', () => {
    expect(generateAlternatives(['2 veg burger (estimated)'])[0]).toBe(
      'Grilled chicken or paneer sandwich 🥪 with whole wheat bread, skip extra cheese.',
    );
  });

  it('gives no specific tip for foods without one', () => {
    expect(generateAlternatives(['roti', 'dal (1 cup)'])).toEqual([...GENERIC_TIPS]);
  });
});

describe('activitySuggestions', () => {
  it('returns the base suggestions for a moderate day', () => {
    expect(activitySuggestions(1800)).toEqual([...BASE_ACTIVITIES]);
  });

  it('adds a longer walk above 2200 kcal', () => {
    expect(activitySuggestions(2201)).toEqual([...BASE_ACTIVITIES, HIGH_INTAKE_ACTIVITY]);
  });

  it('does not add it at exactly 2200 kcal', () => {
    expect(activitySuggestions(2200)).toHaveLength(3);
  });
});
