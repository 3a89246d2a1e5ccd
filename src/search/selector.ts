/**
 * Selector — tree-policy descent to the next node worth expanding.
 */

import type { SearchNode } from './node.js';
import type { SearchTree } from './tree.js';
import { policyScore, type TreePolicy } from './policy.js';

export interface SelectorConfig {
  explorationConstant: number;
  maxBranchingFactor: number;
  epsilon: number;
  treePolicy: TreePolicy;
}

/**
 * Tree-descent policy. Walks down from a starting node, always into the child
 * with the best policy score, and stops at the first node that can still take
 * a new child.
 */
export class Selector {
  constructor(private readonly config: SelectorConfig) {}

  /**
   * Returns the node to expand next, or undefined when nothing under
   * `from` can be expanded right now.
   */
  select(tree: SearchTree, from: SearchNode = tree.root): SearchNode | undefined {
    let node = from;
    for (;;) {
      if (node.terminal) return undefined;
      if (this.hasCapacity(node)) return node;

      const candidates = tree.childrenOf(node.id).filter((child) => !this.isFullyExplored(tree, child));
      const best = this.bestChild(node, candidates);
      if (!best) return undefined;
      node = best;
    }
  }

  /**
   * Highest scoring child. Ties keep the earliest created child.
   */
  bestChild(parent: SearchNode, children: SearchNode[]): SearchNode | undefined {
    let best: SearchNode | undefined;
    let bestScore = Number.NEGATIVE_INFINITY;
    for (const child of children) {
      const score = this.score(parent, child);
      if (best === undefined || score > bestScore) {
        best = child;
        bestScore = score;
      }
    }
    return best;
  }

  score(parent: SearchNode, child: SearchNode): number {
    return policyScore(this.config.treePolicy, child, parent.visits, this.config);
  }

  hasCapacity(node: SearchNode): boolean {
    return !node.terminal && node.children.length + node.pendingExpansions < this.config.maxBranchingFactor;
  }

  /**
   * A node is fully explored when it is terminal, or when it is at full
   * branching and every child below it is fully explored.
   */
  isFullyExplored(tree: SearchTree, node: SearchNode): boolean {
    if (node.terminal) return true;
    if (this.hasCapacity(node)) return false;
    if (node.pendingExpansions > 0) return false;
    return tree.childrenOf(node.id).every((child) => this.isFullyExplored(tree, child));
  }
}
