/**
 * SearchNode — one candidate answer plus its visit statistics.
 */

import { AsyncMutex } from '../core/mutex.js';

/**
 * One candidate reasoning state in the search tree.
 *
 * Identity and content are write-once. `visits`, `totalReward` and `terminal`
 * change over the run; the statistics are only written by the Backpropagator
 * while holding the node's lock.
 */
export class SearchNode {
  /** Child ids in creation order. */
  readonly children: string[] = [];

  visits = 0;
  totalReward = 0;
  terminal = false;

  /** Expansion attempts against this node that produced no child. */
  failedExpansions = 0;

  /** Expansions selected against this node and not yet finished. */
  pendingExpansions = 0;

  readonly lock = new AsyncMutex();

  constructor(
    readonly id: string,
    readonly parentId: string | null,
    readonly content: string,
    readonly depth: number,
    /** Position in the tree's creation order, the root is 0. */
    readonly seq: number,
  ) {}

  /** Q = W / N, undefined until the node has been visited. */
  get meanReward(): number | undefined {
    return this.visits > 0 ? this.totalReward / this.visits : undefined;
  }

  get isRoot(): boolean {
    return this.parentId === null;
  }

  get isLeaf(): boolean {
    return this.children.length === 0;
  }
}

export interface SerializedNode {
  id: string;
  parentId: string | null;
  children: string[];
  content: string;
  visitCount: number;
  totalReward: number;
  meanReward: number | null;
  depth: number;
  terminal: boolean;
}

export function serializeNode(node: SearchNode): SerializedNode {
  return {
    id: node.id,
    parentId: node.parentId,
    children: [...node.children],
    content: node.content,
    visitCount: node.visits,
    totalReward: node.totalReward,
    meanReward: node.meanReward ?? null,
    depth: node.depth,
    terminal: node.terminal,
  };
}
