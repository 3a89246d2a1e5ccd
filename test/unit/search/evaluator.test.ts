import { describe, it, expect } from 'vitest';
import { Evaluator } from '../../../src/search/evaluator.js';
import { scaled } from '../../../src/search/normalizers.js';
import { SearchTree } from '../../../src/search/tree.js';
import type { RawScore } from '../../../src/oracle/types.js';
import { StubOracle, NO_DELAY_RETRY, type ScoreFn } from '../../helpers/stub-oracle.js';

function setup(score: ScoreFn, evaluationSampleCount = 1, normalizer?: (raw: RawScore) => number) {
  const oracle = new StubOracle(() => ({ content: 'unused', isFinal: false }), score);
  const evaluator = new Evaluator(oracle, { evaluationSampleCount, retry: NO_DELAY_RETRY, normalizer });
  const tree = new SearchTree();
  const root = tree.createRoot('problem');
  const node = tree.addChild(root.id, 'candidate answer');
  return { oracle, evaluator, node };
}

describe('Evaluator', () => {
  it('should return the oracle score as reward', async () => {
    const { evaluator, node } = setup(() => 0.75);
    const evaluation = await evaluator.evaluate(node, 'problem');
    expect(evaluation).toEqual({ reward: 0.75, samples: [0.75], failedSamples: 0 });
  });

  it('should pass the candidate content and the problem statement', async () => {
    const { oracle, evaluator, node } = setup(() => 0.5);
    await evaluator.evaluate(node, 'What is 6 * 7?');
    expect(oracle.scoreCalls).toEqual([{ content: 'candidate answer', problem: 'What is 6 * 7?' }]);
  });

  it.each([
    [1.7, 1],
    [-0.3, 0],
    ['not a number', 0],
    [Number.NaN, 0],
    [Number.POSITIVE_INFINITY, 1],
    ['0.4', 0.4],
  ])('should clamp raw score %s to %s', async (raw, expected) => {
    const { evaluator, node } = setup(() => raw);
    const { reward } = await evaluator.evaluate(node, 'problem');
    expect(reward).toBe(expected);
  });

  it('should average several samples into one observation', async () => {
    const scores = [0.2, 0.4, 0.9];
    const { oracle, evaluator, node } = setup((_content, _problem, call) => scores[call - 1], 3);

    const evaluation = await evaluator.evaluate(node, 'problem');

    expect(oracle.scoreCalls).toHaveLength(3);
    expect(evaluation.samples).toEqual([0.2, 0.4, 0.9]);
    expect(evaluation.reward).toBeCloseTo(0.5, 10);
  });

  it('should use a pluggable normalizer', async () => {
    const { evaluator, node } = setup(() => 'Score: 85/100', 1, scaled(0, 100));
    const { reward } = await evaluator.evaluate(node, 'problem');
    expect(reward).toBeCloseTo(0.85, 10);
  });

  it('should score 0 instead of failing when the oracle stays down', async () => {
    const { oracle, evaluator, node } = setup(() => {
      throw new Error('timeout');
    });

    const evaluation = await evaluator.evaluate(node, 'problem');

    expect(evaluation).toEqual({ reward: 0, samples: [0], failedSamples: 1 });
    expect(oracle.scoreCalls).toHaveLength(3);
  });

  it('should score 0 when the normalizer throws', async () => {
    const { evaluator, node } = setup(
      () => 0.9,
      1,
      () => {
        throw new Error('bad normalizer');
      },
    );
    const { reward } = await evaluator.evaluate(node, 'problem');
    expect(reward).toBe(0);
  });
});
