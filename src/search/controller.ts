/**
 * SearchController — runs the search loop and picks the final answer.
 *
 * Owns budgets, termination, cancellation and concurrent iterations.
 */

import { nanoid } from 'nanoid';
import { getLogger } from '../core/logger.js';
import { EventBus } from '../core/events.js';
import { InvalidConfigurationError, NodeRetiredError } from '../core/errors.js';
import {
  SearchConfigSchema,
  type SearchConfig,
  type SearchConfigInput,
  type SearchState,
  type TerminationReason,
} from '../core/types.js';
import type { ModelOracle } from '../oracle/types.js';
import { Backpropagator } from './backpropagator.js';
import { Evaluator } from './evaluator.js';
import type { SearchNode } from './node.js';
import type { ScoreNormalizer } from './normalizers.js';
import { Refiner, type ExpansionOutcome } from './refiner.js';
import { Selector } from './selector.js';
import { SearchTree } from './tree.js';

const logger = getLogger();

export type StopCause =
  | 'iterations'
  | 'threshold'
  | 'failures'
  | 'tree-exhausted'
  | 'cancelled'
  | 'timeout';

export interface SearchResult {
  runId: string;
  /** Root-to-node contents of the best node, the problem statement first. */
  finalTrajectory: string[];
  reward: number;
  visitCount: number;
  terminationReason: TerminationReason;
  stopCause: StopCause;
  /** Set when the run ended in Failed; the trajectory is the best found so far. */
  degraded: boolean;
  nodeId: string;
  iterations: number;
  totalFailures: number;
  durationMs: number;
  tree: SearchTree;
}

export interface SearchControllerOptions {
  oracle: ModelOracle;
  config?: SearchConfigInput;
  normalizer?: ScoreNormalizer;
  events?: EventBus;
  idFactory?: () => string;
}

export interface RunOptions {
  signal?: AbortSignal;
}

interface RunState {
  runId: string;
  problem: string;
  tree: SearchTree;
  state: SearchState;
  stopCause?: StopCause;
  iterationsStarted: number;
  iterationsCompleted: number;
  totalFailures: number;
  /** Nodes taken out of selection after hitting their expansion failure cap. */
  retiredNodes: number;
}

/**
 * Drives select → expand → evaluate → backpropagate against one tree per run
 * until the iteration budget, the reward threshold or the failure ceiling is
 * reached, then extracts the best trajectory.
 *
 * With `concurrency > 1` several iterations are in flight at once; selection
 * and expansion reservations happen synchronously, so concurrent iterations
 * never overfill a node's branching budget.
 */
export class SearchController {
  readonly config: SearchConfig;
  readonly events: EventBus;

  private readonly selector: Selector;
  private readonly refiner: Refiner;
  private readonly evaluator: Evaluator;
  private readonly backpropagator: Backpropagator;
  private readonly idFactory?: () => string;
  private current: RunState | null = null;

  constructor(options: SearchControllerOptions) {
    this.config = parseSearchConfig(options.config ?? {});
    this.events = options.events ?? new EventBus();
    this.idFactory = options.idFactory;

    this.selector = new Selector(this.config);
    this.refiner = new Refiner(options.oracle, this.config);
    this.evaluator = new Evaluator(options.oracle, {
      evaluationSampleCount: this.config.evaluationSampleCount,
      retry: this.config.retry,
      normalizer: options.normalizer,
    });
    this.backpropagator = new Backpropagator({ invertReward: this.config.invertReward });
  }

  /** State of the run in progress, or of the last finished run. */
  get state(): SearchState | undefined {
    return this.current?.state;
  }

  async run(problem: string, options: RunOptions = {}): Promise<SearchResult> {
    const startTime = Date.now();
    const tree = new SearchTree(this.idFactory);
    const root = tree.createRoot(problem);
    const run: RunState = {
      runId: nanoid(8),
      problem,
      tree,
      state: 'Running',
      iterationsStarted: 0,
      iterationsCompleted: 0,
      totalFailures: 0,
      retiredNodes: 0,
    };
    this.current = run;

    const abort = new AbortController();
    let timedOut = false;
    const onCallerAbort = () => abort.abort(options.signal?.reason);
    if (options.signal?.aborted) {
      abort.abort(options.signal.reason);
    } else {
      options.signal?.addEventListener('abort', onCallerAbort, { once: true });
    }
    const timer =
      this.config.timeoutMs !== undefined
        ? setTimeout(() => {
            timedOut = true;
            abort.abort(new Error(`Search timed out after ${this.config.timeoutMs}ms`));
          }, this.config.timeoutMs)
        : undefined;

    logger.info(
      { runId: run.runId, maxIterations: this.config.maxIterations, concurrency: this.config.concurrency },
      'SearchController: starting search',
    );
    this.events.emit('search:start', { runId: run.runId, problem, config: this.config });

    try {
      this.checkTermination(run);
      await this.loop(run, root, abort.signal);
    } finally {
      if (timer) clearTimeout(timer);
      options.signal?.removeEventListener('abort', onCallerAbort);
    }

    if (run.state === 'Running') {
      // Only reachable through cancellation
      run.state = 'BudgetExhausted';
      run.stopCause = timedOut ? 'timeout' : 'cancelled';
    }

    const result = this.extract(run, Date.now() - startTime);

    logger.info(
      {
        runId: run.runId,
        terminationReason: result.terminationReason,
        stopCause: result.stopCause,
        iterations: result.iterations,
        nodes: tree.size,
        reward: result.reward,
      },
      'SearchController: search finished',
    );
    this.events.emit('search:complete', {
      runId: run.runId,
      terminationReason: result.terminationReason,
      iterations: result.iterations,
      reward: result.reward,
      durationMs: result.durationMs,
    });

    return result;
  }

  private async loop(run: RunState, root: SearchNode, signal: AbortSignal): Promise<void> {
    const inFlight = new Set<Promise<void>>();

    try {
      while (run.state === 'Running' && !signal.aborted) {
        const canLaunch =
          inFlight.size < this.config.concurrency && run.iterationsStarted < this.config.maxIterations;
        const node = canLaunch ? this.selector.select(run.tree, root) : undefined;

        if (node) {
          node.pendingExpansions++;
          run.iterationsStarted++;
          const task: Promise<void> = this.iterate(run, node, run.iterationsStarted, signal).finally(() => {
            inFlight.delete(task);
          });
          inFlight.add(task);
          continue;
        }

        if (inFlight.size === 0) {
          // Nothing selectable and nothing pending: every branch is terminal.
          // Branches closed by repeated failures make the run a failure.
          run.state = run.retiredNodes > 0 ? 'Failed' : 'BudgetExhausted';
          run.stopCause = 'tree-exhausted';
          if (run.state === 'Failed') {
            logger.warn(
              { runId: run.runId, retiredNodes: run.retiredNodes, totalFailures: run.totalFailures },
              'SearchController: tree exhausted by expansion failures',
            );
          }
          break;
        }

        await Promise.race(inFlight);
      }
    } finally {
      await Promise.all(inFlight);
    }
  }

  private async iterate(run: RunState, node: SearchNode, iteration: number, signal: AbortSignal): Promise<void> {
    this.events.emit('iteration:start', { runId: run.runId, iteration, nodeId: node.id, depth: node.depth });
    logger.debug({ runId: run.runId, iteration, nodeId: node.id }, 'SearchController: iteration started');

    let outcome: ExpansionOutcome;
    try {
      outcome = await this.refiner.expand(run.tree, node, signal);
    } catch (err) {
      if (signal.aborted) return;
      throw err;
    } finally {
      node.pendingExpansions--;
    }

    if (!outcome.ok && outcome.error instanceof NodeRetiredError) {
      this.completeIteration(run);
      return;
    }

    if (!outcome.ok) {
      run.totalFailures++;
      this.events.emit('expansion:failed', {
        runId: run.runId,
        nodeId: node.id,
        code: outcome.error.code,
        error: outcome.error.message,
        nodeFailures: node.failedExpansions,
        totalFailures: run.totalFailures,
      });
      if (outcome.exhausted) {
        run.retiredNodes++;
        await this.backpropagator.backpropagate(run.tree, node.id, 0);
      }
      this.completeIteration(run);
      return;
    }

    const { child } = outcome;
    this.events.emit('node:expanded', {
      runId: run.runId,
      parentId: node.id,
      nodeId: child.id,
      depth: child.depth,
      terminal: child.terminal,
    });

    let reward: number;
    try {
      ({ reward } = await this.evaluator.evaluate(child, run.problem, signal));
    } catch (err) {
      if (signal.aborted) return;
      throw err;
    }

    await this.backpropagator.backpropagate(run.tree, child.id, reward);
    this.events.emit('node:evaluated', { runId: run.runId, nodeId: child.id, reward });
    this.completeIteration(run);
  }

  private completeIteration(run: RunState): void {
    run.iterationsCompleted++;
    if (run.state === 'Running') {
      this.checkTermination(run);
    }
  }

  /**
   * First match wins: iteration budget, reward threshold, failure ceiling.
   */
  private checkTermination(run: RunState): void {
    if (run.iterationsCompleted >= this.config.maxIterations) {
      run.state = 'BudgetExhausted';
      run.stopCause = 'iterations';
      return;
    }
    const best = bestNode(run.tree);
    if (best && (best.meanReward ?? 0) >= this.config.rewardThreshold) {
      run.state = 'Converged';
      run.stopCause = 'threshold';
      return;
    }
    if (run.totalFailures > this.config.maxTotalFailures) {
      run.state = 'Failed';
      run.stopCause = 'failures';
    }
  }

  private extract(run: RunState, durationMs: number): SearchResult {
    const terminationReason: TerminationReason = run.state === 'Running' ? 'BudgetExhausted' : run.state;
    const best = bestNode(run.tree) ?? run.tree.root;

    return {
      runId: run.runId,
      finalTrajectory: run.tree.trajectory(best.id),
      reward: best.meanReward ?? 0,
      visitCount: best.visits,
      terminationReason,
      stopCause: run.stopCause ?? 'iterations',
      degraded: terminationReason === 'Failed',
      nodeId: best.id,
      iterations: run.iterationsCompleted,
      totalFailures: run.totalFailures,
      durationMs,
      tree: run.tree,
    };
  }
}

/**
 * Visited node with the highest mean reward. Ties go to the deeper node,
 * then to the earlier created one.
 */
export function bestNode(tree: SearchTree): SearchNode | undefined {
  let best: SearchNode | undefined;
  for (const node of tree.all()) {
    const q = node.meanReward;
    if (q === undefined) continue;
    if (!best) {
      best = node;
      continue;
    }
    const bestQ = best.meanReward ?? Number.NEGATIVE_INFINITY;
    if (q > bestQ || (q === bestQ && node.depth > best.depth)) {
      best = node;
    }
  }
  return best;
}

export function parseSearchConfig(input: SearchConfigInput): SearchConfig {
  const parsed = SearchConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new InvalidConfigurationError(`Invalid search configuration: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}
