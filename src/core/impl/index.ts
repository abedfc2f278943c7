import type { FuzzyIndex } from "../fuzzyIndex.js";
import type { IndexKind } from "../types.js";
import { ForwardBackwardIndex } from "./forwardBackwardIndex.js";
import { TrieIndex } from "./trieIndex.js";

export * from "../alphabet.js";
export * from "../budget.js";
export * from "../errors.js";
export type * from "../fuzzyIndex.js";
export type * from "../types.js";
export * from "./boundedEditSearch.js";
export * from "./charTrie.js";
export * from "./collectMatches.js";
export * from "./editTable.js";
export * from "./forwardBackwardIndex.js";
export * from "./levenshtein.js";
export * from "./trieIndex.js";

export const INDEX_KINDS: readonly IndexKind[] = ["trie", "fbtrie"];

export function parseIndexKind(value: string): IndexKind | undefined {
  const v = value.trim().toLowerCase();
  return INDEX_KINDS.find((kind) => kind === v);
}

export function createIndex(kind: IndexKind): FuzzyIndex {
  return kind === "fbtrie" ? new ForwardBackwardIndex() : new TrieIndex();
}
