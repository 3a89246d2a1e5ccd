/**
 * Backpropagator — pushes a reward from a node up to the root.
 */

import type { SearchTree } from './tree.js';

export interface BackpropagatorConfig {
  /** Store the negated reward, for oracles whose scores are costs. */
  invertReward?: boolean;
}

/**
 * The only writer of node statistics. Adds one observation to every node on
 * the root-to-node path, each update taken under that node's own lock so that
 * concurrent iterations sharing an ancestor do not lose writes.
 */
export class Backpropagator {
  constructor(private readonly config: BackpropagatorConfig = {}) {}

  async backpropagate(tree: SearchTree, nodeId: string, reward: number): Promise<void> {
    const value = this.config.invertReward ? -reward : reward;
    const path = tree.pathToRoot(nodeId);

    for (let i = path.length - 1; i >= 0; i--) {
      const node = path[i];
      await node.lock.withLock(() => {
        node.visits += 1;
        node.totalReward += value;
      });
    }
  }
}
