/**
 * Ratcliff/Obershelp sequence similarity: twice the number of characters in
 * recursively found longest matching blocks, divided by the combined length.
 * Strings are compared by code point.
 */

/** Sequences at least this long get their very common elements dropped from the index. */
const POPULAR_MIN_LENGTH = 200;

type CharIndex = Map<string, number[]>;
type Range = [alo: number, ahi: number, blo: number, bhi: number];

interface Match {
  i: number;
  j: number;
  size: number;
}

/** Maps each element of `b` to its ascending positions, minus popular elements of long sequences. */
function indexSequence(b: string[]): CharIndex {
  const index: CharIndex = new Map();
  b.forEach((ch, j) => {
    const positions = index.get(ch);
    if (positions) {
      positions.push(j);
    } else {
      index.set(ch, [j]);
    }
  });

  if (b.length >= POPULAR_MIN_LENGTH) {
    const limit = Math.floor(b.length / 100) + 1;
    for (const [ch, positions] of index) {
      if (positions.length > limit) {
        index.delete(ch);
      }
    }
  }

  return index;
}

/** Longest block a[i..i+size) == b[j..j+size) inside the given ranges; earliest in a, then in b. */
function findLongestMatch(
  a: string[],
  b: string[],
  index: CharIndex,
  [alo, ahi, blo, bhi]: Range,
): Match {
  let besti = alo;
  let bestj = blo;
  let bestSize = 0;
  let runs = new Map<number, number>();

  for (let i = alo; i < ahi; i++) {
    const nextRuns = new Map<number, number>();
    for (const j of index.get(a[i]) ?? []) {
      if (j < blo) continue;
      if (j >= bhi) break;
      const k = (runs.get(j - 1) ?? 0) + 1;
      nextRuns.set(j, k);
      if (k > bestSize) {
        besti = i - k + 1;
        bestj = j - k + 1;
        bestSize = k;
      }
    }
    runs = nextRuns;
  }

  // Popular elements are missing from the index; grow the block across them.
  while (besti > alo && bestj > blo && a[besti - 1] === b[bestj - 1]) {
    besti--;
    bestj--;
    bestSize++;
  }
  while (
    besti + bestSize < ahi &&
    bestj + bestSize < bhi &&
    a[besti + bestSize] === b[bestj + bestSize]
  ) {
    bestSize++;
  }

  return { i: besti, j: bestj, size: bestSize };
}

/** Total size of all matching blocks between a and b. */
function countMatches(a: string[], b: string[], index: CharIndex): number {
  let matched = 0;
  const pending: Range[] = [[0, a.length, 0, b.length]];

  for (let range = pending.pop(); range; range = pending.pop()) {
    const [alo, ahi, blo, bhi] = range;
    const { i, j, size } = findLongestMatch(a, b, index, range);
    if (size === 0) continue;

    matched += size;
    if (alo < i && blo < j) {
      pending.push([alo, i, blo, j]);
    }
    if (i + size < ahi && j + size < bhi) {
      pending.push([i + size, ahi, j + size, bhi]);
    }
  }

  return matched;
}

function ratioOf(matched: number, total: number): number {
  return total === 0 ? 1 : (2 * matched) / total;
}

/** Similarity in [0, 1] between two strings. Not symmetric in rare tie cases. */
export function similarityRatio(a: string, b: string): number {
  const aChars = Array.from(a);
  const bChars = Array.from(b);
  return ratioOf(
    countMatches(aChars, bChars, indexSequence(bChars)),
    aChars.length + bChars.length,
  );
}

/**
 * Returns the candidate most similar to `word` with a ratio of at least
 * `cutoff`, or null. Equal scores go to the lexicographically greatest
 * candidate.
 */
export function closestMatch(
  word: string,
  candidates: Iterable<string>,
  cutoff: number,
): string | null {
  const wordChars = Array.from(word);
  const index = indexSequence(wordChars);

  let best: { score: number; candidate: string } | null = null;
  for (const candidate of candidates) {
    const candidateChars = Array.from(candidate);
    const total = candidateChars.length + wordChars.length;

    // Upper bound from lengths alone.
    if (ratioOf(Math.min(candidateChars.length, wordChars.length), total) < cutoff) {
      continue;
    }

    const score = ratioOf(countMatches(candidateChars, wordChars, index), total);
    if (score < cutoff) continue;

    if (
      best === null ||
      score > best.score ||
      (score === best.score && candidate > best.candidate)
    ) {
      best = { score, candidate };
    }
  }

  return best?.candidate ?? null;
}
