import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, rmSync, writeFileSync, existsSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { ConfigManager } from '../../../src/core/config.js';
import { ConfigError, InvalidConfigurationError } from '../../../src/core/errors.js';

const ENV_KEYS = [
  'ANTHROPIC_API_KEY',
  'OPENAI_API_KEY',
  'REFINE_MCTS_PROVIDER',
  'REFINE_MCTS_MODEL',
  'REFINE_MCTS_MAX_ITERATIONS',
];

describe('ConfigManager', () => {
  const originalEnv = process.env;
  let root: string;
  let projectDir: string;
  let globalDir: string;

  beforeEach(() => {
    process.env = { ...originalEnv };
    for (const key of ENV_KEYS) delete process.env[key];
    root = mkdtempSync(join(tmpdir(), 'refine-mcts-config-'));
    projectDir = join(root, 'project');
    globalDir = join(root, 'global');
    mkdirSync(projectDir);
    mkdirSync(globalDir);
  });

  afterEach(() => {
    process.env = originalEnv;
    rmSync(root, { recursive: true, force: true });
  });

  const writeGlobal = (yaml: string) => writeFileSync(join(globalDir, 'config.yaml'), yaml);
  const writeProject = (yaml: string) => writeFileSync(join(projectDir, '.refine-mcts.yaml'), yaml);

  it('should fall back to defaults without any config file', () => {
    const config = new ConfigManager(projectDir, globalDir).load();

    expect(config.providers.default).toBe('anthropic');
    expect(config.oracle.scoreScale).toBe('percent');
    expect(config.search.maxIterations).toBe(32);
    expect(config.search.rewardThreshold).toBe(0.95);
  });

  it('should let project config override global config key by key', () => {
    writeGlobal('search:\n  maxIterations: 10\n  maxBranchingFactor: 4\n');
    writeProject('search:\n  maxIterations: 20\n');

    const config = new ConfigManager(projectDir, globalDir).load();

    expect(config.search.maxIterations).toBe(20);
    expect(config.search.maxBranchingFactor).toBe(4);
  });

  it('should apply environment variables over files', () => {
    writeProject('providers:\n  default: anthropic\nsearch:\n  maxIterations: 20\n');
    process.env.REFINE_MCTS_PROVIDER = 'openai';
    process.env.REFINE_MCTS_MODEL = 'gpt-4o-mini';
    process.env.REFINE_MCTS_MAX_ITERATIONS = '7';
    process.env.OPENAI_API_KEY = 'test-key';

    const config = new ConfigManager(projectDir, globalDir).load();

    expect(config.providers.default).toBe('openai');
    expect(config.providers.model).toBe('gpt-4o-mini');
    expect(config.providers.openaiApiKey).toBe('test-key');
    expect(config.search.maxIterations).toBe(7);
  });

  it('should apply overrides last and skip undefined entries', () => {
    writeProject('search:\n  maxIterations: 20\n  concurrency: 2\n');
    process.env.REFINE_MCTS_MAX_ITERATIONS = '7';

    const config = new ConfigManager(projectDir, globalDir).load({
      search: { maxIterations: 3, concurrency: undefined },
    });

    expect(config.search.maxIterations).toBe(3);
    expect(config.search.concurrency).toBe(2);
  });

  it('should reject out-of-range values with the offending path', () => {
    writeProject('search:\n  rewardThreshold: 2\n');

    const manager = new ConfigManager(projectDir, globalDir);

    expect(() => manager.load()).toThrow(InvalidConfigurationError);
    try {
      manager.load();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidConfigurationError);
      if (err instanceof InvalidConfigurationError) {
        expect(err.issues).toHaveLength(1);
        expect(err.issues[0]).toMatch(/^search\.rewardThreshold: /);
      }
    }
  });

  it('should reject a non-numeric iteration budget from the environment', () => {
    process.env.REFINE_MCTS_MAX_ITERATIONS = 'lots';

    expect(() => new ConfigManager(projectDir, globalDir).load()).toThrow(InvalidConfigurationError);
  });

  it('should raise ConfigError for unparseable YAML', () => {
    writeProject('search: [1, 2\n');

    expect(() => new ConfigManager(projectDir, globalDir).load()).toThrow(ConfigError);
  });

  it('should raise ConfigError when the document is not a mapping', () => {
    writeProject('- one\n- two\n');

    expect(() => new ConfigManager(projectDir, globalDir).load()).toThrow(
      /Expected a mapping at the top of project config/,
    );
  });

  it('should treat an empty file as no config', () => {
    writeProject('');

    expect(new ConfigManager(projectDir, globalDir).load().search.maxIterations).toBe(32);
  });

  it('should write a default config that loads back', () => {
    const freshGlobal = join(root, 'fresh');
    const manager = new ConfigManager(projectDir, freshGlobal);

    const path = manager.createDefaultConfig();

    expect(path).toBe(join(freshGlobal, 'config.yaml'));
    expect(existsSync(path)).toBe(true);
    const config = manager.load();
    expect(config.search.explorationConstant).toBe(1.414);
    expect(config.search.maxIterations).toBe(32);
  });

  it('should cache the loaded config in get()', () => {
    const manager = new ConfigManager(projectDir, globalDir);
    const first = manager.get();

    writeProject('search:\n  maxIterations: 5\n');

    expect(manager.get()).toBe(first);
    expect(manager.load().search.maxIterations).toBe(5);
  });
});
