import { reverseWord, toSymbols } from "../alphabet.js";
import { constantBudget, twoPhaseBudget } from "../budget.js";
import { assertDistance } from "../errors.js";
import type { FuzzyIndex } from "../fuzzyIndex.js";
import type { FuzzyMatch, Word } from "../types.js";
import { boundedEditSearch } from "./boundedEditSearch.js";
import { CharTrie } from "./charTrie.js";

/**
 * FB-trie: a forward trie of the words and a backward trie of the reversed words.
 *
 * A query of length n is cut at h = floor(n / 2). The forward pass may spend at most
 * floor((k - 1) / 2) edits on the first h symbols before it is allowed the full k;
 * the backward pass does the same for the reversed last n - h symbols with
 * floor(k / 2). Any match within k spends at most one of those amounts on its half,
 * so one of the passes finds it while both prune the wide top levels of their trie
 * with the small budget.
 */
export class ForwardBackwardIndex implements FuzzyIndex {
  private readonly forward = new CharTrie("lexicographic");
  private readonly backward = new CharTrie("lexicographic");

  get size(): number {
    return this.forward.size;
  }

  insert(word: Word): boolean {
    const added = this.forward.insert(word);
    this.backward.insert(reverseWord(word));
    return added;
  }

  has(word: Word): boolean {
    return this.forward.has(word);
  }

  /** Forward matches first, then backward ones; a word can appear in both. */
  fuzzy(query: string, maxDistance: number): Iterable<FuzzyMatch> {
    assertDistance(maxDistance);
    return this.search(query, maxDistance);
  }

  complete(prefix: string, maxDistance: number): Iterable<FuzzyMatch> {
    assertDistance(maxDistance);
    return boundedEditSearch(this.forward, prefix, constantBudget(maxDistance), { prefix: true });
  }

  render(): string[] {
    return [...this.forward.render(), ...this.backward.render()];
  }

  private *search(query: string, k: number): Generator<FuzzyMatch, void, undefined> {
    const n = toSymbols(query).length;
    const half = Math.floor(n / 2);

    const headLimit = k === 0 ? 0 : Math.floor((k - 1) / 2);
    yield* boundedEditSearch(this.forward, query, twoPhaseBudget(k, headLimit, half));

    const tailLimit = Math.floor(k / 2);
    for (const m of boundedEditSearch(this.backward, reverseWord(query), twoPhaseBudget(k, tailLimit, n - half))) {
      yield { word: reverseWord(m.word), distance: m.distance };
    }
  }
}
