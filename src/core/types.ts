/** Shared core types used by module contracts. */

export type Word = string;

/** A dictionary word paired with its edit distance to the query that found it. */
export interface FuzzyMatch {
  word: Word;
  distance: number;
}

export type IndexKind = "trie" | "fbtrie";

/** Order in which a trie node's children are visited. */
export type ChildOrder = "insertion" | "lexicographic";
