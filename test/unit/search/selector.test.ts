import { describe, it, expect } from 'vitest';
import { Selector, type SelectorConfig } from '../../../src/search/selector.js';
import { SearchTree } from '../../../src/search/tree.js';
import { Backpropagator } from '../../../src/search/backpropagator.js';

function makeSelector(overrides: Partial<SelectorConfig> = {}): Selector {
  return new Selector({
    explorationConstant: Math.SQRT2,
    maxBranchingFactor: 2,
    epsilon: 1e-6,
    treePolicy: 'uct',
    ...overrides,
  });
}

const backprop = new Backpropagator();

describe('Selector', () => {
  it('should return the root while it has spare branching capacity', () => {
    const tree = new SearchTree();
    const root = tree.createRoot('problem');
    tree.addChild(root.id, 'a');

    expect(makeSelector().select(tree)).toBe(root);
  });

  it('should prefer an unvisited child over a visited sibling at Q=0.9', async () => {
    const tree = new SearchTree();
    const root = tree.createRoot('problem');
    const visited = tree.addChild(root.id, 'visited');
    const unvisited = tree.addChild(root.id, 'unvisited');
    await backprop.backpropagate(tree, visited.id, 0.9);

    expect(visited.meanReward).toBeCloseTo(0.9);
    expect(makeSelector().select(tree)).toBe(unvisited);
  });

  it('should break ties by creation order', async () => {
    const tree = new SearchTree();
    const root = tree.createRoot('problem');
    const first = tree.addChild(root.id, 'first');
    const second = tree.addChild(root.id, 'second');
    await backprop.backpropagate(tree, first.id, 0.5);
    await backprop.backpropagate(tree, second.id, 0.5);

    expect(makeSelector().select(tree)).toBe(first);
  });

  it('should descend into the best child when the parent is full', async () => {
    const tree = new SearchTree();
    const root = tree.createRoot('problem');
    const good = tree.addChild(root.id, 'good');
    const bad = tree.addChild(root.id, 'bad');
    const goodA = tree.addChild(good.id, 'good-a');
    const goodB = tree.addChild(good.id, 'good-b');
    await backprop.backpropagate(tree, goodA.id, 0.9);
    await backprop.backpropagate(tree, goodB.id, 0.8);
    await backprop.backpropagate(tree, bad.id, 0.1);

    const selected = makeSelector({ explorationConstant: 0 }).select(tree);
    expect(selected).toBe(goodA);
  });

  it('should skip terminal children', async () => {
    const tree = new SearchTree();
    const root = tree.createRoot('problem');
    const done = tree.addChild(root.id, 'final answer');
    const open = tree.addChild(root.id, 'draft');
    done.terminal = true;
    await backprop.backpropagate(tree, done.id, 1);
    await backprop.backpropagate(tree, open.id, 0.2);

    expect(makeSelector().select(tree)).toBe(open);
  });

  it('should return undefined when every branch is terminal', async () => {
    const tree = new SearchTree();
    const root = tree.createRoot('problem');
    const only = tree.addChild(root.id, 'final');
    only.terminal = true;
    await backprop.backpropagate(tree, only.id, 1);

    const selector = makeSelector({ maxBranchingFactor: 1 });
    expect(selector.select(tree)).toBeUndefined();
    expect(selector.isFullyExplored(tree, root)).toBe(true);
  });

  it('should count pending expansions against branching capacity', () => {
    const tree = new SearchTree();
    const root = tree.createRoot('problem');
    root.pendingExpansions = 1;

    const selector = makeSelector({ maxBranchingFactor: 1 });
    expect(selector.hasCapacity(root)).toBe(false);
    expect(selector.isFullyExplored(tree, root)).toBe(false);
    expect(selector.select(tree)).toBeUndefined();
  });

  it('should never select from a terminal starting node', () => {
    const tree = new SearchTree();
    const root = tree.createRoot('problem');
    root.terminal = true;

    expect(makeSelector().select(tree)).toBeUndefined();
  });

  it('should compute the UCT score from Q, N and the parent visit count', async () => {
    const tree = new SearchTree();
    const root = tree.createRoot('problem');
    const a = tree.addChild(root.id, 'a');
    const b = tree.addChild(root.id, 'b');
    await backprop.backpropagate(tree, a.id, 0.5);
    await backprop.backpropagate(tree, b.id, 1);
    await backprop.backpropagate(tree, b.id, 0);

    const selector = makeSelector({ explorationConstant: 1 });
    // root N = 3
    expect(selector.score(root, a)).toBeCloseTo(0.5 + Math.sqrt(Math.log(4) / (1 + 1e-6)), 9);
    expect(selector.score(root, b)).toBeCloseTo(0.5 + Math.sqrt(Math.log(4) / (2 + 1e-6)), 9);
  });

  it('should support the UCB1 policy', async () => {
    const tree = new SearchTree();
    const root = tree.createRoot('problem');
    const a = tree.addChild(root.id, 'a');
    const b = tree.addChild(root.id, 'b');
    await backprop.backpropagate(tree, a.id, 0.25);
    await backprop.backpropagate(tree, b.id, 0.75);

    const selector = makeSelector({ explorationConstant: 2, treePolicy: 'ucb1' });
    // root N = 2
    expect(selector.score(root, a)).toBeCloseTo(0.25 + 2 * Math.sqrt(2 * Math.log(2)), 9);
  });
});
