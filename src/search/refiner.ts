/**
 * Refiner — the expansion step of the search.
 *
 * Asks the oracle to critique and rewrite the trajectory ending at a node and
 * records the answer as a new child. Failures are counted per node.
 */

import { z } from 'zod';
import { getLogger } from '../core/logger.js';
import {
  MalformedCompletionError,
  NodeRetiredError,
  OracleUnavailableError,
  toError,
} from '../core/errors.js';
import type { RetryPolicy } from '../core/types.js';
import type { ModelOracle, OracleCompletion } from '../oracle/types.js';
import { retry, RetryExhaustedError } from '../utils/retry.js';
import type { SearchNode } from './node.js';
import type { SearchTree } from './tree.js';

const logger = getLogger();

const CompletionSchema = z.object({
  content: z.string().refine((text) => text.trim().length > 0, 'content is empty'),
  isFinal: z.boolean(),
});

export interface RefinerConfig {
  maxExpansionFailuresPerNode: number;
  retry: RetryPolicy;
}

export type ExpansionOutcome =
  | { ok: true; child: SearchNode; attempts: number }
  | {
      ok: false;
      error: OracleUnavailableError | MalformedCompletionError | NodeRetiredError;
      /** The node ran out of expansion attempts and is now terminal. */
      exhausted: boolean;
    };

/**
 * Expander / self-refine step: asks the oracle to revise the trajectory that
 * ends at a node and records the answer as exactly one new child.
 */
export class Refiner {
  constructor(
    private readonly oracle: ModelOracle,
    private readonly config: RefinerConfig,
  ) {}

  /**
   * Expand `node` by one child. Oracle failures come back as an outcome
   * rather than an exception; consistency errors from the tree still throw.
   */
  async expand(tree: SearchTree, node: SearchNode, signal?: AbortSignal): Promise<ExpansionOutcome> {
    const history = tree.trajectory(node.id);

    let completion: OracleCompletion;
    let attempts = 0;
    try {
      completion = await this.requestCompletion(history, signal, (attempt) => {
        attempts = attempt;
      });
    } catch (err) {
      if (signal?.aborted) throw toError(err);
      const error =
        err instanceof MalformedCompletionError || err instanceof OracleUnavailableError
          ? err
          : new OracleUnavailableError(toError(err).message, attempts, toError(err));
      return this.recordFailure(node, error);
    }

    if (node.terminal) {
      // Retired by a concurrent iteration while this request was in flight
      logger.debug({ nodeId: node.id, attempts }, 'Refiner: dropping completion for retired node');
      return { ok: false, error: new NodeRetiredError(node.id), exhausted: false };
    }

    const child = tree.addChild(node.id, completion.content);
    child.terminal = completion.isFinal;

    logger.debug(
      { parentId: node.id, nodeId: child.id, depth: child.depth, terminal: child.terminal, attempts },
      'Refiner: child created',
    );
    return { ok: true, child, attempts };
  }

  private async requestCompletion(
    history: string[],
    signal: AbortSignal | undefined,
    onAttempt: (attempt: number) => void,
  ): Promise<OracleCompletion> {
    const { retry: policy } = this.config;
    let raw: unknown;
    try {
      raw = await retry(
        (attempt) => {
          onAttempt(attempt);
          return this.oracle.generate(history, { signal });
        },
        {
          maxAttempts: policy.maxAttempts,
          baseDelay: policy.baseDelayMs,
          maxDelay: policy.maxDelayMs,
          backoffFactor: policy.backoffFactor,
          shouldRetry: (error) => !(error instanceof MalformedCompletionError),
          onRetry: (attempt, error) => {
            logger.warn({ attempt, error: error.message }, 'Refiner: retrying oracle generate');
          },
          signal,
        },
      );
    } catch (err) {
      if (err instanceof RetryExhaustedError) {
        throw new OracleUnavailableError(
          `Oracle generate failed after ${err.attempts} attempt(s): ${err.lastError.message}`,
          err.attempts,
          err.lastError,
        );
      }
      throw err;
    }

    const parsed = CompletionSchema.safeParse(raw);
    if (!parsed.success) {
      throw new MalformedCompletionError(
        `Oracle returned an unusable completion: ${parsed.error.issues.map((i) => i.message).join('; ')}`,
      );
    }
    return parsed.data;
  }

  private recordFailure(
    node: SearchNode,
    error: OracleUnavailableError | MalformedCompletionError,
  ): ExpansionOutcome {
    node.failedExpansions++;
    const exhausted = node.failedExpansions >= this.config.maxExpansionFailuresPerNode;
    if (exhausted) {
      node.terminal = true;
    }

    logger.warn(
      { nodeId: node.id, code: error.code, failures: node.failedExpansions, exhausted, error: error.message },
      'Refiner: expansion failed',
    );
    return { ok: false, error, exhausted };
  }
}
