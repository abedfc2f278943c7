import {
  collectMatches,
  createIndex,
  type FuzzyIndex,
  type FuzzyMatch,
  type IndexKind,
} from "../core/impl/index.js";

export type SearchMode = "word" | "prefix";

export interface SearchQuery {
  query: string;
  maxDistance: number;
  limit: number;
  mode: SearchMode;
}

export interface SearchResponse {
  results: FuzzyMatch[];
  total: number;
}

export interface Dictionary {
  readonly kind: IndexKind;
  size(): number;
  /** Returns false when the word was already present. */
  insert(word: string): boolean;
  search(q: SearchQuery): SearchResponse;
}

export function createDictionary(kind: IndexKind, index: FuzzyIndex = createIndex(kind)): Dictionary {
  return {
    kind,
    size() {
      return index.size;
    },
    insert(word) {
      return index.insert(word);
    },
    search(q) {
      const matches = q.mode === "prefix" ? index.complete(q.query, q.maxDistance) : index.fuzzy(q.query, q.maxDistance);
      const { matches: results, total } = collectMatches(matches, q.limit);
      return { results, total };
    },
  };
}
