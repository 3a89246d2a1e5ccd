/**
 * Evaluator — scores a candidate answer into a reward in [0, 1].
 */

import { getLogger } from '../core/logger.js';
import type { RetryPolicy } from '../core/types.js';
import type { ModelOracle } from '../oracle/types.js';
import { retry } from '../utils/retry.js';
import type { SearchNode } from './node.js';
import { clampUnit, unitInterval, type ScoreNormalizer } from './normalizers.js';

const logger = getLogger();

export interface EvaluatorConfig {
  evaluationSampleCount: number;
  retry: RetryPolicy;
  normalizer?: ScoreNormalizer;
}

export interface Evaluation {
  /** Mean of the per-sample rewards, in [0, 1]. */
  reward: number;
  samples: number[];
  /** Samples whose oracle call failed and were scored 0. */
  failedSamples: number;
}

/**
 * Scores a node's content through the oracle. Each sample is normalized into
 * [0, 1]; with several samples the mean is returned as a single observation.
 */
export class Evaluator {
  private readonly normalize: ScoreNormalizer;

  constructor(
    private readonly oracle: ModelOracle,
    private readonly config: EvaluatorConfig,
  ) {
    this.normalize = config.normalizer ?? unitInterval;
  }

  async evaluate(node: SearchNode, problem: string, signal?: AbortSignal): Promise<Evaluation> {
    const count = this.config.evaluationSampleCount;
    const outcomes = await Promise.all(
      Array.from({ length: count }, () => this.sample(node, problem, signal)),
    );

    signal?.throwIfAborted();

    const samples = outcomes.map((outcome) => outcome.reward);
    const failedSamples = outcomes.filter((outcome) => outcome.failed).length;
    const reward = samples.reduce((sum, value) => sum + value, 0) / samples.length;

    logger.debug({ nodeId: node.id, reward, samples, failedSamples }, 'Evaluator: node scored');
    return { reward, samples, failedSamples };
  }

  private async sample(
    node: SearchNode,
    problem: string,
    signal?: AbortSignal,
  ): Promise<{ reward: number; failed: boolean }> {
    const policy = this.config.retry;
    try {
      const raw = await retry(() => this.oracle.score(node.content, problem, { signal }), {
        maxAttempts: policy.maxAttempts,
        baseDelay: policy.baseDelayMs,
        maxDelay: policy.maxDelayMs,
        backoffFactor: policy.backoffFactor,
        onRetry: (attempt, error) => {
          logger.warn({ nodeId: node.id, attempt, error: error.message }, 'Evaluator: retrying oracle score');
        },
        signal,
      });
      return { reward: this.safeNormalize(raw), failed: false };
    } catch (err) {
      if (signal?.aborted) return { reward: 0, failed: true };
      const message = err instanceof Error ? err.message : String(err);
      logger.warn({ nodeId: node.id, error: message }, 'Evaluator: scoring failed, using lower bound');
      return { reward: 0, failed: true };
    }
  }

  private safeNormalize(raw: unknown): number {
    if (typeof raw !== 'number' && typeof raw !== 'string') return 0;
    try {
      return clampUnit(this.normalize(raw));
    } catch (err) {
      logger.warn({ raw, error: err instanceof Error ? err.message : String(err) }, 'Evaluator: normalizer threw');
      return 0;
    }
  }
}
