import { assertDistance } from "../errors.js";
import { constantBudget, depthBudget } from "../budget.js";
import type { FuzzyIndex } from "../fuzzyIndex.js";
import type { FuzzyMatch, Word } from "../types.js";
import { boundedEditSearch } from "./boundedEditSearch.js";
import { CharTrie } from "./charTrie.js";

export interface TrieFuzzyOptions {
  /** Per-depth budget; replaces the constant `maxDistance` for acceptance and pruning. */
  budget?: (depth: number) => number;
  /** Completion search instead of whole-word search. */
  prefix?: boolean;
}

/** Single trie, searched in one pass with the full budget. */
export class TrieIndex implements FuzzyIndex {
  private readonly trie = new CharTrie("insertion");

  get size(): number {
    return this.trie.size;
  }

  insert(word: Word): boolean {
    return this.trie.insert(word);
  }

  has(word: Word): boolean {
    return this.trie.has(word);
  }

  fuzzy(query: string, maxDistance: number, options: TrieFuzzyOptions = {}): Iterable<FuzzyMatch> {
    assertDistance(maxDistance);
    const budget = options.budget ? depthBudget(maxDistance, options.budget) : constantBudget(maxDistance);
    return boundedEditSearch(this.trie, query, budget, { prefix: options.prefix });
  }

  complete(prefix: string, maxDistance: number): Iterable<FuzzyMatch> {
    return this.fuzzy(prefix, maxDistance, { prefix: true });
  }

  render(): string[] {
    return this.trie.render();
  }
}
