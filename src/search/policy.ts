import type { SearchNode } from './node.js';

export type TreePolicy = 'uct' | 'ucb1';

export interface PolicyParams {
  explorationConstant: number;
  epsilon: number;
}

type PolicyFn = (q: number, n: number, parentVisits: number, params: PolicyParams) => number;

const POLICIES: Record<TreePolicy, PolicyFn> = {
  // Q + c * sqrt(ln(N_parent + 1) / (N + eps))
  uct: (q, n, parentVisits, { explorationConstant, epsilon }) =>
    q + explorationConstant * Math.sqrt(Math.log(parentVisits + 1) / (n + epsilon)),
  // Q + c * sqrt(2 ln(N_parent) / N)
  ucb1: (q, n, parentVisits, { explorationConstant }) =>
    q + explorationConstant * Math.sqrt((2 * Math.log(Math.max(parentVisits, 1))) / n),
};

/**
 * Score a child for tree descent. Unvisited children score +Infinity under
 * every policy, so each child is tried once before any is exploited.
 */
export function policyScore(
  policy: TreePolicy,
  child: SearchNode,
  parentVisits: number,
  params: PolicyParams,
): number {
  const q = child.meanReward;
  if (q === undefined) return Number.POSITIVE_INFINITY;
  return POLICIES[policy](q, child.visits, parentVisits, params);
}
