import { readFileSync, existsSync, writeFileSync, mkdirSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { AppConfigSchema, type AppConfig } from './types.js';
import { ConfigError, InvalidConfigurationError } from './errors.js';

export type ConfigOverrides = {
  [K in keyof AppConfig]?: Partial<AppConfig[K]>;
};

export class ConfigManager {
  private config: AppConfig | null = null;
  private globalDir: string;
  private projectDir: string;

  constructor(projectDir?: string, globalDir?: string) {
    this.globalDir = globalDir || join(homedir(), '.refine-mcts');
    this.projectDir = projectDir || process.cwd();
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- global config <- project config <- env vars <- overrides
   */
  load(overrides?: ConfigOverrides): AppConfig {
    let raw: Record<string, unknown> = {};

    // 1. Global config
    raw = this.deepMerge(raw, this.readYaml(join(this.globalDir, 'config.yaml'), 'global'));

    // 2. Project config
    raw = this.deepMerge(raw, this.readYaml(join(this.projectDir, '.refine-mcts.yaml'), 'project'));

    // 3. Environment variables
    raw = this.applyEnvVars(raw);

    // 4. Caller overrides
    if (overrides) {
      raw = this.deepMerge(raw, stripUndefined(overrides));
    }

    // 5. Validate with Zod
    const parsed = AppConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
      throw new InvalidConfigurationError(`Invalid configuration: ${issues.join('; ')}`, issues);
    }

    this.config = parsed.data;
    return this.config;
  }

  get(): AppConfig {
    if (!this.config) {
      return this.load();
    }
    return this.config;
  }

  /**
   * Create a commented default global config if none exists yet.
   */
  createDefaultConfig(): string {
    const configPath = join(this.globalDir, 'config.yaml');
    if (!existsSync(this.globalDir)) {
      mkdirSync(this.globalDir, { recursive: true });
    }
    if (!existsSync(configPath)) {
      const defaultConfig = `# refine-mcts global configuration
providers:
  default: anthropic
  # anthropicApiKey: ...
  # openaiApiKey: ...

oracle:
  scoreScale: percent
  temperature: 0.7

search:
  explorationConstant: 1.414
  maxIterations: 32
  maxBranchingFactor: 3
  rewardThreshold: 0.95
  maxExpansionFailuresPerNode: 3
  maxTotalFailures: 10
  evaluationSampleCount: 1
  concurrency: 1
`;
      writeFileSync(configPath, defaultConfig, 'utf-8');
    }
    return configPath;
  }

  private readYaml(path: string, label: string): Record<string, unknown> {
    if (!existsSync(path)) return {};
    let parsed: unknown;
    try {
      parsed = parseYaml(readFileSync(path, 'utf-8'));
    } catch (err) {
      throw new ConfigError(`Failed to parse ${label} config at ${path}`, err instanceof Error ? err : undefined);
    }
    if (parsed === null || parsed === undefined) return {};
    if (!isRecord(parsed)) {
      throw new ConfigError(`Expected a mapping at the top of ${label} config ${path}`);
    }
    return parsed;
  }

  private applyEnvVars(raw: Record<string, unknown>): Record<string, unknown> {
    const providers = isRecord(raw.providers) ? { ...raw.providers } : {};
    const search = isRecord(raw.search) ? { ...raw.search } : {};

    if (process.env.ANTHROPIC_API_KEY) {
      providers.anthropicApiKey = process.env.ANTHROPIC_API_KEY;
    }
    if (process.env.OPENAI_API_KEY) {
      providers.openaiApiKey = process.env.OPENAI_API_KEY;
    }
    if (process.env.REFINE_MCTS_PROVIDER) {
      providers.default = process.env.REFINE_MCTS_PROVIDER;
    }
    if (process.env.REFINE_MCTS_MODEL) {
      providers.model = process.env.REFINE_MCTS_MODEL;
    }
    if (process.env.REFINE_MCTS_MAX_ITERATIONS) {
      search.maxIterations = Number(process.env.REFINE_MCTS_MAX_ITERATIONS);
    }

    return { ...raw, providers, search };
  }

  private deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
    const result = { ...target };
    for (const key of Object.keys(source)) {
      const incoming = source[key];
      const existing = target[key];
      if (isRecord(incoming) && isRecord(existing)) {
        result[key] = this.deepMerge(existing, incoming);
      } else {
        result[key] = incoming;
      }
    }
    return result;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stripUndefined(value: object): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (entry === undefined) continue;
    result[key] = isRecord(entry) ? stripUndefined(entry) : entry;
  }
  return result;
}
