import { z } from 'zod';

// ===== Configuration =====

export const RetryPolicySchema = z.object({
  /** Total attempts per oracle request, the first one included. */
  maxAttempts: z.number().int().min(1).default(3),
  baseDelayMs: z.number().min(0).default(500),
  maxDelayMs: z.number().min(0).default(8000),
  backoffFactor: z.number().min(1).default(2),
}).default({});

export type RetryPolicy = z.infer<typeof RetryPolicySchema>;

export const SearchConfigSchema = z.object({
  explorationConstant: z.number().min(0).default(Math.SQRT2),
  maxIterations: z.number().int().min(0).default(32),
  maxBranchingFactor: z.number().int().min(1).default(3),
  rewardThreshold: z.number().min(0).max(1).default(0.95),
  maxExpansionFailuresPerNode: z.number().int().min(1).default(3),
  maxTotalFailures: z.number().int().min(0).default(10),
  evaluationSampleCount: z.number().int().min(1).default(1),
  /** Number of iterations allowed in flight against the shared tree. */
  concurrency: z.number().int().min(1).default(1),
  treePolicy: z.enum(['uct', 'ucb1']).default('uct'),
  epsilon: z.number().positive().default(1e-6),
  invertReward: z.boolean().default(false),
  timeoutMs: z.number().int().positive().optional(),
  retry: RetryPolicySchema,
});

export type SearchConfig = z.infer<typeof SearchConfigSchema>;
export type SearchConfigInput = z.input<typeof SearchConfigSchema>;

export const AppConfigSchema = z.object({
  providers: z.object({
    default: z.enum(['anthropic', 'openai']).default('anthropic'),
    anthropicApiKey: z.string().optional(),
    openaiApiKey: z.string().optional(),
    model: z.string().optional(),
  }).default({}),
  oracle: z.object({
    scoreScale: z.enum(['unit', 'percent', 'ten']).default('percent'),
    temperature: z.number().min(0).max(2).default(0.7),
    maxTokens: z.number().int().positive().default(2048),
  }).default({}),
  search: SearchConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

// ===== Search outcome =====

export type TerminationReason = 'Converged' | 'BudgetExhausted' | 'Failed';

export type SearchState = 'Running' | TerminationReason;

// ===== Events =====

export interface SearchEvents {
  'search:start': { runId: string; problem: string; config: SearchConfig };
  'iteration:start': { runId: string; iteration: number; nodeId: string; depth: number };
  'node:expanded': { runId: string; parentId: string; nodeId: string; depth: number; terminal: boolean };
  'node:evaluated': { runId: string; nodeId: string; reward: number };
  'expansion:failed': {
    runId: string;
    nodeId: string;
    code: string;
    error: string;
    nodeFailures: number;
    totalFailures: number;
  };
  'search:complete': {
    runId: string;
    terminationReason: TerminationReason;
    iterations: number;
    reward: number;
    durationMs: number;
  };
}
