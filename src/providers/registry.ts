import type { LLMProvider } from './types.js';
import type { AppConfig } from '../core/types.js';
import { AnthropicProvider } from './anthropic.js';
import { OpenAIProvider } from './openai.js';
import { ConfigError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';

export class ProviderRegistry {
  private providers = new Map<string, LLMProvider>();
  private defaultProvider: string;
  private logger = getLogger();

  constructor(defaultProvider: string = 'anthropic') {
    this.defaultProvider = defaultProvider;
  }

  /**
   * Build a registry holding every provider that has credentials configured.
   */
  static async create(config: AppConfig): Promise<ProviderRegistry> {
    const registry = new ProviderRegistry(config.providers.default);
    await registry.discoverProviders(config);
    return registry;
  }

  register(name: string, provider: LLMProvider): void {
    this.providers.set(name, provider);
    this.logger.debug({ provider: name }, 'Provider registered');
  }

  get(name: string): LLMProvider {
    const provider = this.providers.get(name);
    if (!provider) {
      const available = this.listAvailable();
      throw new ConfigError(
        `Provider "${name}" is not configured. Available: ${available.length > 0 ? available.join(', ') : 'none'}`,
      );
    }
    return provider;
  }

  getDefault(): LLMProvider {
    return this.get(this.defaultProvider);
  }

  has(name: string): boolean {
    return this.providers.has(name);
  }

  listAvailable(): string[] {
    return Array.from(this.providers.keys());
  }

  async discoverProviders(config: AppConfig): Promise<void> {
    const anthropic = new AnthropicProvider({
      apiKey: config.providers.anthropicApiKey,
      defaultModel: config.providers.default === 'anthropic' ? config.providers.model : undefined,
    });
    if (await anthropic.isAvailable()) {
      this.register('anthropic', anthropic);
    }

    const openai = new OpenAIProvider({
      apiKey: config.providers.openaiApiKey,
      defaultModel: config.providers.default === 'openai' ? config.providers.model : undefined,
    });
    if (await openai.isAvailable()) {
      this.register('openai', openai);
    }
  }
}
