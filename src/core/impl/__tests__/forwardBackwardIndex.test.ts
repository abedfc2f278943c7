import { describe, expect, it } from "vitest";
import { ForwardBackwardIndex, InvalidWordError, collectMatches } from "../index.js";

function fbOf(words: string[]): ForwardBackwardIndex {
  const index = new ForwardBackwardIndex();
  for (const w of words) index.insert(w);
  return index;
}

describe("ForwardBackwardIndex", () => {
  it("keeps both orientations in step", () => {
    const index = fbOf(["ab", "ac"]);
    expect(index.render()).toEqual(["a/", " ab", " ac", "/", " ba", " ca"]);
  });

  it("reports words found by the backward pass in their original spelling", () => {
    // "zbc" differs from "abc" in the first half only, so only the backward pass reaches it
    const index = fbOf(["zbc"]);
    expect(Array.from(index.fuzzy("abc", 1))).toEqual([{ word: "zbc", distance: 1 }]);
  });

  it("can report a word from both passes", () => {
    const index = fbOf(["abcd"]);
    expect(Array.from(index.fuzzy("abcd", 2))).toEqual([
      { word: "abcd", distance: 0 },
      { word: "abcd", distance: 0 },
    ]);
  });

  it("matches one-symbol queries with a one-edit budget", () => {
    const index = fbOf(["y", "ab"]);
    expect(collectMatches(index.fuzzy("x", 1)).matches).toEqual([{ word: "y", distance: 1 }]);
    expect(collectMatches(index.fuzzy("a", 1)).matches).toEqual([
      { word: "ab", distance: 1 },
      { word: "y", distance: 1 },
    ]);
  });

  it("rejects words containing the terminator", () => {
    const index = fbOf(["cat"]);
    expect(() => index.insert("c\0t")).toThrow(InvalidWordError);
    expect(index.size).toBe(1);
    expect(index.has("cat")).toBe(true);
  });

  it("completes prefixes from the forward trie in symbol order", () => {
    const index = fbOf(["cart", "care", "cut", "dog"]);
    expect(Array.from(index.complete("cat", 1))).toEqual([
      { word: "care", distance: 1 },
      { word: "cart", distance: 1 },
      { word: "cut", distance: 1 },
    ]);
  });
});
