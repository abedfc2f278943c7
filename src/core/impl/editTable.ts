/**
 * Levenshtein DP rows for one query, one row per trie depth.
 *
 * Row `i` holds the distances between the current length-`i` trie path and every
 * query prefix. Rows are overwritten as the walk backtracks, so a table belongs to a
 * single search and must not be shared between concurrent searches.
 */
export class EditTable {
  private readonly rows: Uint32Array[];

  constructor(
    private readonly query: readonly string[],
    maxDepth: number,
  ) {
    const width = query.length + 1;
    this.rows = Array.from({ length: maxDepth + 1 }, () => new Uint32Array(width));
    for (let j = 0; j < width; j++) this.rows[0][j] = j;
  }

  get queryLength(): number {
    return this.query.length;
  }

  /** Rows exist for depths 0..maxDepth. */
  hasRow(depth: number): boolean {
    return depth < this.rows.length;
  }

  at(depth: number, column: number): number {
    return this.rows[depth][column];
  }

  /** Fills row `depth` from row `depth - 1` for the edge `symbol`; returns the row minimum. */
  fill(depth: number, symbol: string): number {
    const prev = this.rows[depth - 1];
    const row = this.rows[depth];

    row[0] = depth;
    let smallest = depth;
    for (let j = 1; j < row.length; j++) {
      const substitute = prev[j - 1] + (symbol === this.query[j - 1] ? 0 : 1);
      const insert = prev[j] + 1;
      const remove = row[j - 1] + 1;
      const cell = Math.min(substitute, insert, remove);
      row[j] = cell;
      if (cell < smallest) smallest = cell;
    }
    return smallest;
  }
}
