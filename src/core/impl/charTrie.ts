import { TERMINATOR, assertWord } from "../alphabet.js";
import type { ChildOrder, FuzzyMatch, Word } from "../types.js";

export type NodeId = number;
export type Edge = readonly [symbol: string, child: NodeId];

type Node = {
  children: Map<string, NodeId>;
  /** lexicographic edge list, rebuilt lazily after the node changes */
  sorted: Edge[] | undefined;
};

function makeNode(): Node {
  return { children: new Map(), sorted: undefined };
}

function compareEdges([a]: Edge, [b]: Edge): number {
  return (a.codePointAt(0) ?? 0) - (b.codePointAt(0) ?? 0);
}

export const ROOT: NodeId = 0;

/**
 * Character trie stored as an arena of nodes. Every word ends in a TERMINATOR edge,
 * so a node is a complete word exactly when it has one.
 */
export class CharTrie {
  private readonly nodes: Node[] = [makeNode()];
  private words = 0;
  private longest = 0;

  constructor(readonly order: ChildOrder = "insertion") {}

  get size(): number {
    return this.words;
  }

  /** Length in symbols of the longest stored word. */
  get depth(): number {
    return this.longest;
  }

  insert(word: Word): boolean {
    assertWord(word);

    let cur = ROOT;
    let length = 0;
    for (const ch of word) {
      cur = this.childOrCreate(cur, ch);
      length++;
    }

    if (this.node(cur).children.has(TERMINATOR)) return false;
    this.childOrCreate(cur, TERMINATOR);
    this.words++;
    if (length > this.longest) this.longest = length;
    return true;
  }

  has(word: Word): boolean {
    let cur: NodeId | undefined = ROOT;
    for (const ch of word) {
      cur = this.node(cur).children.get(ch);
      if (cur === undefined) return false;
    }
    return this.node(cur).children.has(TERMINATOR);
  }

  edges(id: NodeId): Iterable<Edge> {
    const node = this.node(id);
    if (this.order === "insertion") return node.children.entries();

    if (!node.sorted) node.sorted = Array.from(node.children.entries()).sort(compareEdges);
    return node.sorted;
  }

  /** Every word below `id`, spelled as `prefix` plus the path from `id`, tagged with `distance`. */
  *enumerate(id: NodeId, prefix: string, distance: number): Generator<FuzzyMatch, void, undefined> {
    // `emit` entries stand for a terminator edge so words come out in child order
    const stack: Array<{ id: NodeId; word: string; emit: boolean }> = [{ id, word: prefix, emit: false }];

    for (let top = stack.pop(); top; top = stack.pop()) {
      if (top.emit) {
        yield { word: top.word, distance };
        continue;
      }

      const edges = Array.from(this.edges(top.id));
      for (let e = edges.length - 1; e >= 0; e--) {
        const [ch, child] = edges[e];
        if (ch === TERMINATOR) stack.push({ id: child, word: top.word, emit: true });
        else stack.push({ id: child, word: top.word + ch, emit: false });
      }
    }
  }

  /**
   * One line per word; a node with several children first prints its prefix and
   * "/" and indents everything below it by one more space.
   */
  render(): string[] {
    const out: string[] = [];
    const walk = (id: NodeId, sofar: string, indent: string): void => {
      const branching = this.node(id).children.size > 1;
      if (branching) out.push(`${indent}${sofar}/`);
      const inner = branching ? indent + " " : indent;

      for (const [ch, child] of this.edges(id)) {
        if (ch === TERMINATOR) out.push(inner + sofar);
        else walk(child, sofar + ch, inner);
      }
    };
    walk(ROOT, "", "");
    return out;
  }

  private node(id: NodeId): Node {
    const node = this.nodes[id];
    if (!node) throw new RangeError(`unknown trie node ${id}`);
    return node;
  }

  private childOrCreate(id: NodeId, ch: string): NodeId {
    const node = this.node(id);
    let next = node.children.get(ch);
    if (next === undefined) {
      next = this.nodes.length;
      this.nodes.push(makeNode());
      node.children.set(ch, next);
      node.sorted = undefined;
    }
    return next;
  }
}
