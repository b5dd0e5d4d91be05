/**
 * Jaro-Winkler similarity, used for audit and hints only.
 *
 * Matching decisions are made by exact rules; these scores are attached to
 * partial-name decisions and to unresolved facility labels so a reviewer can
 * spot optimistic matches and likely misspellings.
 */

import natural from 'natural';

/**
 * Similarity of two strings on a 0-1 scale, rounded to 4 decimals.
 *
 * @example
 * stringSimilarity("smith", "smith") // 1
 * stringSimilarity("", "smith")      // 0
 */
export function stringSimilarity(a: string, b: string): number {
  if (!a || !b) {
    return 0;
  }
  if (a === b) {
    return 1;
  }
  return Math.round(natural.JaroWinklerDistance(a, b, {}) * 10000) / 10000;
}

/**
 * Best-scoring candidate at or above the threshold, or undefined.
 * The earliest candidate wins a tie.
 */
export function closestMatch(
  target: string,
  candidates: Iterable<string>,
  threshold: number
): { value: string; similarity: number } | undefined {
  let best: { value: string; similarity: number } | undefined;

  for (const candidate of candidates) {
    const similarity = stringSimilarity(target, candidate);
    if (similarity >= threshold && (best === undefined || similarity > best.similarity)) {
      best = { value: candidate, similarity };
    }
  }

  return best;
}
