import { toSymbols } from "../alphabet.js";

/**
 * Levenshtein distance between two strings, counted in code points.
 * Keeps two rows of the DP matrix instead of the full table.
 */
export function levenshtein(a: string, b: string): number {
  const s = toSymbols(a);
  const t = toSymbols(b);
  if (s.length === 0) return t.length;
  if (t.length === 0) return s.length;

  let prev = Array.from({ length: t.length + 1 }, (_, j) => j);
  let cur = new Array<number>(t.length + 1).fill(0);

  for (let i = 1; i <= s.length; i++) {
    cur[0] = i;
    for (let j = 1; j <= t.length; j++) {
      const substitutionCost = s[i - 1] === t[j - 1] ? 0 : 1;
      cur[j] = Math.min(
        cur[j - 1] + 1, // insertion
        prev[j] + 1, // deletion
        prev[j - 1] + substitutionCost,
      );
    }
    [prev, cur] = [cur, prev];
  }

  return prev[t.length];
}
