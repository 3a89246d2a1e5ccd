/**
 * `refine-mcts solve "problem"` — run a search and print the best trajectory.
 */

import { Command, InvalidArgumentError } from 'commander';
import { writeFileSync } from 'fs';
import { resolve } from 'path';
import { ConfigManager, type ConfigOverrides } from '../../core/config.js';
import type { AppConfig } from '../../core/types.js';
import { ProviderRegistry } from '../../providers/registry.js';
import { LLMOracle } from '../../oracle/llm-oracle.js';
import { SearchController, type SearchResult } from '../../search/controller.js';
import { normalizerForScale } from '../../search/normalizers.js';
import { formatDuration, formatReward, preview } from '../../utils/format.js';

const PROVIDERS = ['anthropic', 'openai'] as const;

export interface SolveOptions {
  dir: string;
  iterations?: number;
  branching?: number;
  exploration?: number;
  threshold?: number;
  samples?: number;
  concurrency?: number;
  timeout?: number;
  provider?: AppConfig['providers']['default'];
  model?: string;
  json?: boolean;
  tree?: string;
  dot?: string;
}

export function createSolveCommand(): Command {
  const cmd = new Command('solve');

  cmd
    .description('Search for the best self-refined answer to a problem')
    .argument('<problem...>', 'The problem statement')
    .option('-d, --dir <directory>', 'Project directory holding .refine-mcts.yaml', '.')
    .option('-n, --iterations <count>', 'Maximum search iterations', parseInteger)
    .option('-b, --branching <count>', 'Maximum children per node', parseInteger)
    .option('-c, --exploration <value>', 'UCT exploration constant', parseNumber)
    .option('-t, --threshold <value>', 'Stop once a node reaches this mean reward', parseNumber)
    .option('--samples <count>', 'Scoring calls averaged per evaluation', parseInteger)
    .option('--concurrency <count>', 'Iterations in flight at once', parseInteger)
    .option('--timeout <ms>', 'Cancel the search after this many milliseconds', parseInteger)
    .option('--provider <provider>', `LLM provider (${PROVIDERS.join(', ')})`, parseProvider)
    .option('--model <model>', 'Override the provider default model')
    .option('--json', 'Output the result as JSON')
    .option('--tree <file>', 'Write the final search tree as JSON')
    .option('--dot <file>', 'Write the final search tree as Graphviz DOT')
    .option('--verbose', 'Log every search step to stderr')
    .action(async (problemParts: string[], options: SolveOptions) => {
      await executeSolve(problemParts.join(' '), options);
    });

  return cmd;
}

export function buildOverrides(options: SolveOptions): ConfigOverrides {
  return {
    providers: { default: options.provider, model: options.model },
    search: {
      maxIterations: options.iterations,
      maxBranchingFactor: options.branching,
      explorationConstant: options.exploration,
      rewardThreshold: options.threshold,
      evaluationSampleCount: options.samples,
      concurrency: options.concurrency,
      timeoutMs: options.timeout,
    },
  };
}

async function executeSolve(problem: string, options: SolveOptions): Promise<void> {
  const configManager = new ConfigManager(resolve(options.dir));
  const config = configManager.load(buildOverrides(options));

  const registry = await ProviderRegistry.create(config);
  const provider = registry.getDefault();
  const oracle = new LLMOracle(provider, {
    model: config.providers.model,
    temperature: config.oracle.temperature,
    maxTokens: config.oracle.maxTokens,
  });

  const controller = new SearchController({
    oracle,
    config: config.search,
    normalizer: normalizerForScale(config.oracle.scoreScale),
  });

  if (!options.json) {
    console.log();
    console.log(`Searching with ${provider.name} (${config.search.maxIterations} iterations max)`);
    console.log();

    controller.events.on('node:evaluated', ({ nodeId, reward }) => {
      console.log(`  ${nodeId}  reward ${formatReward(reward)}`);
    });
    controller.events.on('expansion:failed', ({ nodeId, code }) => {
      console.log(`  ${nodeId}  expansion failed (${code})`);
    });
  }

  const abort = new AbortController();
  const onSigint = () => abort.abort(new Error('Interrupted'));
  process.once('SIGINT', onSigint);

  let result: SearchResult;
  try {
    result = await controller.run(problem, { signal: abort.signal });
  } finally {
    process.off('SIGINT', onSigint);
  }

  if (options.tree) {
    writeFileSync(resolve(options.tree), JSON.stringify(result.tree.toJSON(), null, 2), 'utf-8');
  }
  if (options.dot) {
    writeFileSync(resolve(options.dot), result.tree.toDot({ policy: config.search.treePolicy }), 'utf-8');
  }

  if (options.json) {
    console.log(JSON.stringify(toJsonOutput(result), null, 2));
    return;
  }

  printResult(result);
}

export function toJsonOutput(result: SearchResult): Record<string, unknown> {
  return {
    finalTrajectory: result.finalTrajectory,
    reward: result.reward,
    visitCount: result.visitCount,
    terminationReason: result.terminationReason,
    stopCause: result.stopCause,
    degraded: result.degraded,
    iterations: result.iterations,
    totalFailures: result.totalFailures,
    nodes: result.tree.size,
    durationMs: result.durationMs,
  };
}

function printResult(result: SearchResult): void {
  console.log();
  console.log('─'.repeat(60));
  console.log();
  console.log(`Termination: ${result.terminationReason} (${result.stopCause})${result.degraded ? ' [degraded]' : ''}`);
  console.log(`Reward: ${formatReward(result.reward)} over ${result.visitCount} visit(s)`);
  console.log(`Iterations: ${result.iterations}, failures: ${result.totalFailures}, nodes: ${result.tree.size}`);
  console.log(`Time: ${formatDuration(result.durationMs)}`);
  console.log();

  const [, ...steps] = result.finalTrajectory;
  if (steps.length === 0) {
    console.log('No scored answer was produced.');
    return;
  }
  steps.slice(0, -1).forEach((step, index) => {
    console.log(`  Refinement ${index + 1}: ${preview(step)}`);
  });
  console.log();
  console.log(steps[steps.length - 1]);
  console.log();
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

function parseProvider(value: string): AppConfig['providers']['default'] {
  const match = PROVIDERS.find((name) => name === value);
  if (!match) {
    throw new InvalidArgumentError(`Expected one of: ${PROVIDERS.join(', ')}.`);
  }
  return match;
}
