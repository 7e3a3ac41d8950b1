import type { FoodResolver } from '../resolver/resolve.js';
import type { ResolvedItem } from '../types.js';

interface ResolveFoodDeps {
  resolver: FoodResolver;
}

interface ResolveFoodParams {
  phrase: string;
}

/** Handles a single-phrase lookup without logging anything. */
export function handleResolveFood(
  deps: ResolveFoodDeps,
  params: ResolveFoodParams,
): ResolvedItem {
  if (params.phrase.trim() === '') {
    throw new Error('Phrase must not be blank.');
  }
  return deps.resolver.resolve(params.phrase);
}
