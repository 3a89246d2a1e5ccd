import { describe, it, expect } from 'vitest';
import { BaseLLMProvider } from '../../../src/providers/base.js';
import type { LLMRequest, LLMResponse } from '../../../src/providers/types.js';
import { ProviderError } from '../../../src/core/errors.js';

class ScriptedProvider extends BaseLLMProvider {
  readonly name = 'scripted';
  readonly models = ['scripted-small', 'scripted-large'];
  readonly defaultModel = 'scripted-small';
  requests: LLMRequest[] = [];

  constructor(
    private readonly handler: (request: LLMRequest) => Promise<LLMResponse>,
    defaultModel?: string,
  ) {
    super({ defaultModel });
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }

  protected async _complete(request: LLMRequest): Promise<LLMResponse> {
    this.requests.push(request);
    return this.handler(request);
  }
}

const reply = async (request: LLMRequest): Promise<LLMResponse> => ({
  content: 'ok',
  model: request.model ?? 'unknown',
  usage: { inputTokens: 1, outputTokens: 1, totalTokens: 2 },
  finishReason: 'stop',
});

describe('BaseLLMProvider', () => {
  const messages = [{ role: 'user' as const, content: 'hello' }];

  it('should fill in the configured default model', async () => {
    const provider = new ScriptedProvider(reply, 'scripted-large');

    const response = await provider.complete({ messages });

    expect(response.model).toBe('scripted-large');
  });

  it('should prefer the model named on the request', async () => {
    const provider = new ScriptedProvider(reply, 'scripted-large');

    const response = await provider.complete({ messages, model: 'scripted-small' });

    expect(response.model).toBe('scripted-small');
  });

  it('should wrap failures in ProviderError without retrying', async () => {
    const provider = new ScriptedProvider(async () => {
      throw new Error('429 rate limited');
    });

    const error = await provider.complete({ messages }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ProviderError);
    if (error instanceof ProviderError) {
      expect(error.message).toBe('scripted request failed: 429 rate limited');
      expect(error.provider).toBe('scripted');
      expect(error.cause?.message).toBe('429 rate limited');
    }
    expect(provider.requests).toHaveLength(1);
  });

  it('should pass aborts through unwrapped', async () => {
    const abort = new AbortController();
    const provider = new ScriptedProvider(async () => {
      abort.abort();
      throw new Error('Request was aborted.');
    });

    const error = await provider.complete({ messages, signal: abort.signal }).catch((err: unknown) => err);

    expect(error).not.toBeInstanceOf(ProviderError);
    expect(error).toBeInstanceOf(Error);
  });
});
