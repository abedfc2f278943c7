import { describe, expect, it } from "vitest";
import {
  CharTrie,
  EditTable,
  boundedEditSearch,
  constantBudget,
  depthBudget,
  twoPhaseBudget,
  type NodeId,
} from "../index.js";

function trieOf(words: string[]): CharTrie {
  const trie = new CharTrie();
  for (const w of words) trie.insert(w);
  return trie;
}

class CountingTrie extends CharTrie {
  visits = 0;

  override edges(id: NodeId) {
    this.visits++;
    return super.edges(id);
  }
}

describe("EditTable", () => {
  it("fills rows with the Levenshtein recurrence", () => {
    const table = new EditTable(["c", "a", "t"], 4);
    expect(table.fill(1, "b")).toBe(1);
    expect(table.fill(2, "a")).toBe(1);
    expect(table.fill(3, "t")).toBe(1);
    expect([0, 1, 2, 3].map((j) => table.at(3, j))).toEqual([3, 3, 2, 1]);
  });

  it("has a row for every depth up to maxDepth", () => {
    const table = new EditTable(["a", "b"], 4);
    expect(table.hasRow(4)).toBe(true);
    expect(table.hasRow(5)).toBe(false);
  });
});

describe("boundedEditSearch", () => {
  it("finds every word within one edit", () => {
    const trie = trieOf(["cat", "cats", "bat", "rat"]);
    expect(Array.from(boundedEditSearch(trie, "cat", constantBudget(1)))).toEqual([
      { word: "cat", distance: 0 },
      { word: "cats", distance: 1 },
      { word: "bat", distance: 1 },
      { word: "rat", distance: 1 },
    ]);
  });

  it("reports the exact distance for kitten/sitting", () => {
    const trie = trieOf(["kitten"]);
    expect(Array.from(boundedEditSearch(trie, "sitting", constantBudget(3)))).toEqual([{ word: "kitten", distance: 3 }]);
    expect(Array.from(boundedEditSearch(trie, "sitting", constantBudget(2)))).toEqual([]);
  });

  it("matches exactly with a zero budget", () => {
    const trie = trieOf(["cat", "cart"]);
    expect(Array.from(boundedEditSearch(trie, "cat", constantBudget(0)))).toEqual([{ word: "cat", distance: 0 }]);
    expect(Array.from(boundedEditSearch(trie, "ca", constantBudget(0)))).toEqual([]);
  });

  it("counts only insertions for an empty query", () => {
    const trie = trieOf(["", "a", "ab"]);
    expect(Array.from(boundedEditSearch(trie, "", constantBudget(1)))).toEqual([
      { word: "", distance: 0 },
      { word: "a", distance: 1 },
    ]);
  });

  it("accepts a word that ends at the last table row", () => {
    const trie = trieOf(["ab", "abc"]);
    expect(Array.from(boundedEditSearch(trie, "a", constantBudget(1)))).toEqual([{ word: "ab", distance: 1 }]);
  });

  it("sizes the table by the longest word when the budget is huge", () => {
    const trie = trieOf(["cat", "dog"]);
    expect(Array.from(boundedEditSearch(trie, "cat", constantBudget(2 ** 32)))).toEqual([
      { word: "cat", distance: 0 },
      { word: "dog", distance: 3 },
    ]);
  });

  it("returns nothing for a query far longer than any word", () => {
    const trie = trieOf(["ab"]);
    expect(Array.from(boundedEditSearch(trie, "abcdefgh", constantBudget(1)))).toEqual([]);
  });

  it("applies a per-depth budget", () => {
    const trie = trieOf(["cat", "cats", "bat", "rat", "cot"]);
    const budget = depthBudget(1, (depth) => (depth <= 1 ? 0 : 1));
    expect(Array.from(boundedEditSearch(trie, "cat", budget))).toEqual([
      { word: "cat", distance: 0 },
      { word: "cats", distance: 1 },
      { word: "cot", distance: 1 },
    ]);
  });

  it("keeps a head-phase branch only while the head stays within its limit", () => {
    const trie = trieOf(["xbcd", "axcd", "abcx"]);
    // head "ab" must match exactly, the rest may spend the full budget
    expect(Array.from(boundedEditSearch(trie, "abcd", twoPhaseBudget(1, 0, 2)))).toEqual([{ word: "abcx", distance: 1 }]);
  });

  it("completes prefixes within budget", () => {
    const trie = trieOf(["cart", "care", "cut", "dog"]);
    expect(Array.from(boundedEditSearch(trie, "cat", constantBudget(1), { prefix: true }))).toEqual([
      { word: "cart", distance: 1 },
      { word: "care", distance: 1 },
      { word: "cut", distance: 1 },
    ]);
    expect(Array.from(boundedEditSearch(trie, "ca", constantBudget(0), { prefix: true }))).toEqual([
      { word: "cart", distance: 0 },
      { word: "care", distance: 0 },
    ]);
  });

  it("completes everything from an empty prefix", () => {
    const trie = trieOf(["b", "a"]);
    expect(Array.from(boundedEditSearch(trie, "", constantBudget(0), { prefix: true }))).toEqual([
      { word: "b", distance: 0 },
      { word: "a", distance: 0 },
    ]);
  });

  it("stops walking once the consumer stops pulling", () => {
    const trie = new CountingTrie();
    for (const w of ["aa", "ab", "ac"]) trie.insert(w);

    for (const m of boundedEditSearch(trie, "aa", constantBudget(2))) {
      expect(m).toEqual({ word: "aa", distance: 0 });
      break;
    }
    expect(trie.visits).toBe(3);

    trie.visits = 0;
    expect(Array.from(boundedEditSearch(trie, "aa", constantBudget(2)))).toHaveLength(3);
    expect(trie.visits).toBe(5);
  });
});
