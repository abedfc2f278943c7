import type { FuzzyMatch } from "../types.js";

export const byDistanceThenWord = (a: FuzzyMatch, b: FuzzyMatch): number =>
  a.distance - b.distance || (a.word < b.word ? -1 : a.word > b.word ? 1 : 0);

export interface CollectedMatches {
  matches: FuzzyMatch[];
  /** distinct words before `limit` was applied */
  total: number;
}

/**
 * Drains `matches`, keeping each word once at its smallest reported distance,
 * ordered by distance then word. With `limit` only the best `limit` are kept.
 */
export function collectMatches(matches: Iterable<FuzzyMatch>, limit?: number): CollectedMatches {
  const best = new Map<string, number>();
  for (const { word, distance } of matches) {
    const seen = best.get(word);
    if (seen === undefined || distance < seen) best.set(word, distance);
  }

  const unique = Array.from(best, ([word, distance]) => ({ word, distance })).sort(byDistanceThenWord);
  return { matches: limit === undefined ? unique : unique.slice(0, limit), total: unique.length };
}
