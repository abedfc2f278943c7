import { TERMINATOR, toSymbols } from "../alphabet.js";
import { acceptLimit, initialPhase, pruneLimit, type Budget, type Phase } from "../budget.js";
import type { FuzzyMatch } from "../types.js";
import { ROOT, type CharTrie, type Edge, type NodeId } from "./charTrie.js";
import { EditTable } from "./editTable.js";

export interface BoundedSearchOptions {
  /**
   * Completion search: once a path is as long as the query and within budget,
   * report every word below it with that distance.
   */
  prefix?: boolean;
}

interface Frame {
  node: NodeId;
  depth: number;
  phase: Phase;
  edges: Iterator<Edge>;
}

/**
 * Branch-and-bound walk of `trie` yielding every word within `budget` of `query`.
 *
 * The walk is depth-first over an explicit frame stack and fills one table row per
 * edge; a branch is cut as soon as the smallest value in its row exceeds the budget.
 * Nothing is visited after the consumer stops pulling.
 */
export function* boundedEditSearch(
  trie: CharTrie,
  query: string,
  budget: Budget,
  options: BoundedSearchOptions = {},
): Generator<FuzzyMatch, void, undefined> {
  const symbols = toSymbols(query);
  // past n + k no candidate comes back within budget, past the longest word there is no path
  const table = new EditTable(symbols, Math.min(symbols.length + budget.limit, trie.depth));
  const n = table.queryLength;
  const prefix = options.prefix ?? false;
  const path: string[] = [];

  const open = (node: NodeId, depth: number, phase: Phase): Frame => ({
    node,
    depth,
    phase,
    edges: trie.edges(node)[Symbol.iterator](),
  });

  if (prefix && n === 0) {
    if (0 <= pruneLimit(budget, 1, initialPhase(budget))) yield* trie.enumerate(ROOT, "", 0);
    return;
  }

  const stack: Frame[] = [open(ROOT, 0, initialPhase(budget))];

  while (stack.length) {
    const frame = stack[stack.length - 1];
    const next = frame.edges.next();
    if (next.done) {
      stack.pop();
      if (frame.depth > 0) path.pop();
      continue;
    }

    const [symbol, child] = next.value;
    const depth = frame.depth + 1;

    if (symbol === TERMINATOR) {
      const distance = table.at(frame.depth, n);
      if (distance <= acceptLimit(budget, depth)) yield { word: path.join(""), distance };
      continue;
    }

    if (!table.hasRow(depth)) continue;
    const smallest = table.fill(depth, symbol);

    let phase = frame.phase;
    if (budget.kind === "two-phase" && phase === "head" && table.at(depth, budget.headLength) <= budget.headLimit) {
      phase = "tail";
    } else if (smallest > pruneLimit(budget, depth, phase)) {
      continue;
    }

    if (prefix && depth >= n) {
      const distance = table.at(depth, n);
      if (distance <= pruneLimit(budget, depth + 1, phase)) {
        yield* trie.enumerate(child, path.join("") + symbol, distance);
      }
      continue;
    }

    path.push(symbol);
    stack.push(open(child, depth, phase));
  }
}
