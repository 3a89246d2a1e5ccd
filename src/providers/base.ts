import type { LLMProvider, LLMRequest, LLMResponse, ProviderConfig } from './types.js';
import { getLogger } from '../core/logger.js';
import { ProviderError, toError } from '../core/errors.js';

/**
 * Shared request plumbing for concrete providers. Retrying is left to the
 * caller: the search core applies its own backoff policy to every oracle call.
 */
export abstract class BaseLLMProvider implements LLMProvider {
  abstract readonly name: string;
  abstract readonly models: string[];
  abstract readonly defaultModel: string;

  protected logger = getLogger();
  protected config: ProviderConfig;

  constructor(config: ProviderConfig = {}) {
    this.config = {
      timeout: 120000,
      ...config,
    };
  }

  async complete(request: LLMRequest): Promise<LLMResponse> {
    const model = request.model || this.config.defaultModel || this.defaultModel;
    this.logger.debug({ provider: this.name, model }, 'LLM request');

    try {
      const response = await this._complete({ ...request, model });
      this.logger.debug(
        { provider: this.name, model, tokens: response.usage.totalTokens },
        'LLM response',
      );
      return response;
    } catch (err) {
      if (request.signal?.aborted) throw toError(err);
      const cause = toError(err);
      throw new ProviderError(`${this.name} request failed: ${cause.message}`, this.name, cause);
    }
  }

  abstract isAvailable(): Promise<boolean>;

  protected abstract _complete(request: LLMRequest): Promise<LLMResponse>;
}
