/**
 * refine-mcts — Monte Carlo tree search over self-refined LLM answers.
 * Public SDK exports for programmatic usage
 *
 * @example
 * ```typescript
 * import { SearchController, LLMOracle, AnthropicProvider, scaled } from 'refine-mcts';
 *
 * const oracle = new LLMOracle(new AnthropicProvider());
 * const controller = new SearchController({
 *   oracle,
 *   config: { maxIterations: 16 },
 *   normalizer: scaled(0, 100),
 * });
 * const result = await controller.run('How many primes are below 100?');
 * console.log(result.finalTrajectory.at(-1), result.reward);
 * ```
 */

// Core
export { EventBus } from './core/events.js';
export { ConfigManager, type ConfigOverrides } from './core/config.js';
export { createLogger, getLogger, setLogger } from './core/logger.js';
export { AsyncMutex } from './core/mutex.js';
export {
  SearchError,
  ConfigError,
  InvalidConfigurationError,
  ProviderError,
  OracleUnavailableError,
  MalformedCompletionError,
  UnknownParentError,
  NodeNotFoundError,
  NodeRetiredError,
  DuplicateRootError,
} from './core/errors.js';
export {
  AppConfigSchema,
  SearchConfigSchema,
  RetryPolicySchema,
  type AppConfig,
  type SearchConfig,
  type SearchConfigInput,
  type RetryPolicy,
  type SearchEvents,
  type SearchState,
  type TerminationReason,
} from './core/types.js';

// Search
export * from './search/index.js';

// Oracle
export { LLMOracle, parseSolution, type LLMOracleConfig } from './oracle/llm-oracle.js';
export { FINAL_ANSWER_MARKER, buildRefineMessages, buildScoreMessages } from './oracle/prompts.js';
export type { ModelOracle, OracleCompletion, OracleCallOptions, RawScore } from './oracle/types.js';

// Providers
export { AnthropicProvider } from './providers/anthropic.js';
export { OpenAIProvider } from './providers/openai.js';
export { ProviderRegistry } from './providers/registry.js';
export type { LLMProvider, LLMRequest, LLMResponse, LLMMessage, ProviderConfig } from './providers/types.js';

// Utilities
export { retry, sleep, RetryExhaustedError, type RetryOptions } from './utils/retry.js';

// Version
export { VERSION, NAME } from './version.js';
