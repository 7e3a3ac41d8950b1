import { describe, it, expect } from 'vitest';
import { loadCatalog } from '../../resolver/catalog.js';
import { FoodResolver } from '../../resolver/resolve.js';
import { handleResolveFood } from '../resolve-food.js';

const resolver = new FoodResolver(loadCatalog());

describe('handleResolveFood', () => {
  it('resolves one phrase', () => {
    expect(handleResolveFood({ resolver }, { phrase: 'omelet' })).toEqual({
      rawText: 'omelet',
      canonicalName: 'omelette (2 eggs)',
      calorieEstimate: 190,
    });
  });

  it('rejects a blank phrase', () => {
    expect(() => handleResolveFood({ resolver }, { phrase: '   ' })).toThrow(
      'Phrase must not be blank.',
    );
  });
});
