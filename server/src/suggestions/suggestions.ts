/** Swap tips keyed by a fragment of the canonical food name, in match order. */
const ALTERNATIVES: ReadonlyArray<readonly [string, string]> = [
  ['paratha', 'Swap paratha with chapati/roti 🫓 to cut oil and save ~80–100 kcal per piece.'],
  ['biryani', 'Try veg pulao 🍚 or smaller portion biryani; pair with salad to fill up.'],
  ['paneer butter masala', 'Choose kadai paneer 🌶️ or palak paneer; ask for less butter/ghee.'],
  ['fries', 'Baked sweet potato wedges 🍠 or roasted chana.'],
  ['burger', 'Grilled chicken or paneer sandwich 🥪 with whole wheat bread, skip extra cheese.'],
  ['pizza', 'Thin-crust veggie pizza 🍕, go easy on cheese, add a side salad.'],
  ['samosa', 'Air-fried samosa or chana chaat 🥗; limit to one.'],
  ['jalebi', 'Fresh fruit 🍎 or a small piece of dark chocolate.'],
  ['halwa', 'Fruit yogurt 🍓 or kheer with less sugar.'],
];

/** Always appended after the food-specific tips. */
export const GENERIC_TIPS = [
  'Choose grilled/roasted over fried 🔥→🍽️, and ask for less butter/ghee.',
  'Add a fiber boost: salad, veggies, dal 🥗 to feel full with fewer calories.',
] as const;

export const BASE_ACTIVITIES = [
  'Take a brisk walk 🚶‍♀️ 20–30 minutes after meals to support digestion and energy.',
  'Try 10–15 minutes of bodyweight moves 💪 (squats, lunges, planks) to feel active.',
  'On busy days, split short walks: 3×10 minutes 🕒.',
] as const;

export const HIGH_INTAKE_ACTIVITY =
  'If intake is higher than usual, consider a longer walk today 🌤️ or add light yoga 🧘.';

/** Daily totals above this get the extra activity suggestion. */
export const HIGH_INTAKE_KCAL = 2200;

/** Returns swap tips for the logged food names plus the generic tips, without duplicates. */
export function generateAlternatives(foodNames: readonly string[]): string[] {
  const tips: string[] = [];
  for (const name of foodNames) {
    const key = name.toLowerCase();
    for (const [fragment, tip] of ALTERNATIVES) {
      if (key.includes(fragment)) {
        tips.push(tip);
      }
    }
  }
  tips.push(...GENERIC_TIPS);
  return [...new Set(tips)];
}

export function activitySuggestions(totalKcal: number): string[] {
  const suggestions: string[] = [...BASE_ACTIVITIES];
  if (totalKcal > HIGH_INTAKE_KCAL) {
    suggestions.push(HIGH_INTAKE_ACTIVITY);
  }
  return suggestions;
}
