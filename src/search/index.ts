// Search core — MCTS over self-refined trajectories
export { SearchController, bestNode, parseSearchConfig } from './controller.js';
export { SearchTree } from './tree.js';
export { SearchNode, serializeNode } from './node.js';
export { Selector } from './selector.js';
export { Refiner } from './refiner.js';
export { Evaluator } from './evaluator.js';
export { Backpropagator } from './backpropagator.js';
export { policyScore } from './policy.js';
export {
  clampUnit,
  extractNumber,
  normalizerForScale,
  scaled,
  unitInterval,
} from './normalizers.js';

export type {
  SearchControllerOptions,
  SearchResult,
  RunOptions,
  StopCause,
} from './controller.js';
export type { SerializedTree, DotOptions } from './tree.js';
export type { SerializedNode } from './node.js';
export type { SelectorConfig } from './selector.js';
export type { RefinerConfig, ExpansionOutcome } from './refiner.js';
export type { EvaluatorConfig, Evaluation } from './evaluator.js';
export type { BackpropagatorConfig } from './backpropagator.js';
export type { TreePolicy, PolicyParams } from './policy.js';
export type { ScoreNormalizer, ScoreScale } from './normalizers.js';
