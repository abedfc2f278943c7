import type { FuzzyMatch, Word } from "./types.js";

/**
 * Static dictionary answering "every word within k edits of this query".
 *
 * Contract notes:
 * - words are inserted first, then queried; inserting during an open query is unsupported
 * - results are lazy; dropping the iterable stops the walk
 * - a word may be reported more than once, callers dedupe (see collectMatches)
 */
export interface FuzzyIndex {
  readonly size: number;

  /** Returns false when the word was already stored. */
  insert(word: Word): boolean;
  has(word: Word): boolean;

  /** Words whose Levenshtein distance to `query` is at most `maxDistance`. */
  fuzzy(query: string, maxDistance: number): Iterable<FuzzyMatch>;

  /** Words starting with something within `maxDistance` edits of `prefix`. */
  complete(prefix: string, maxDistance: number): Iterable<FuzzyMatch>;

  /** Indented outline of the stored words, for debugging. */
  render(): string[];
}
