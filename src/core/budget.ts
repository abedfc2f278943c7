/**
 * Distance budgets for a bounded trie walk.
 *
 * `limit` always sizes the edit table (query length + limit + 1 rows) and is the
 * largest distance a match can be reported with.
 */
export type Budget = ConstantBudget | DepthBudget | TwoPhaseBudget;

export interface ConstantBudget {
  kind: "constant";
  limit: number;
}

/** Budget chosen per row; `at(depth)` is consulted while row `depth` is being filled. */
export interface DepthBudget {
  kind: "depth";
  limit: number;
  at: (depth: number) => number;
}

/**
 * Head/tail budget of the forward/backward search.
 *
 * While in the head phase a branch survives only if its row minimum stays within
 * `headLimit`; once the first `headLength` query symbols are matched within
 * `headLimit` the branch moves to the tail phase and is pruned against `limit`.
 */
export interface TwoPhaseBudget {
  kind: "two-phase";
  limit: number;
  headLimit: number;
  headLength: number;
}

export type Phase = "head" | "tail";

export function constantBudget(limit: number): ConstantBudget {
  return { kind: "constant", limit };
}

export function depthBudget(limit: number, at: (depth: number) => number): DepthBudget {
  return { kind: "depth", limit, at };
}

export function twoPhaseBudget(limit: number, headLimit: number, headLength: number): TwoPhaseBudget {
  return { kind: "two-phase", limit, headLimit, headLength };
}

/** An empty candidate already matches the head when it is short enough to delete. */
export function initialPhase(budget: Budget): Phase {
  return budget.kind === "two-phase" && budget.headLength > budget.headLimit ? "head" : "tail";
}

/** Largest distance a word ending at `depth` may have to be accepted. */
export function acceptLimit(budget: Budget, depth: number): number {
  return budget.kind === "depth" ? budget.at(depth) : budget.limit;
}

/** Largest row minimum that keeps a branch at `depth` alive. */
export function pruneLimit(budget: Budget, depth: number, phase: Phase): number {
  switch (budget.kind) {
    case "constant":
      return budget.limit;
    case "depth":
      return budget.at(depth);
    case "two-phase":
      return phase === "head" ? budget.headLimit : budget.limit;
  }
}
