import Anthropic from '@anthropic-ai/sdk';
import { BaseLLMProvider } from './base.js';
import type { LLMRequest, LLMResponse, ProviderConfig } from './types.js';

export class AnthropicProvider extends BaseLLMProvider {
  readonly name = 'anthropic';
  readonly models = ['claude-sonnet-4-20250514', 'claude-3-5-haiku-20241022'];
  readonly defaultModel = 'claude-sonnet-4-20250514';

  private client: Anthropic | null = null;

  constructor(config: ProviderConfig = {}) {
    super(config);
  }

  private getClient(): Anthropic {
    if (!this.client) {
      this.client = new Anthropic({
        apiKey: this.config.apiKey || process.env.ANTHROPIC_API_KEY,
        timeout: this.config.timeout,
        maxRetries: 0,
      });
    }
    return this.client;
  }

  async isAvailable(): Promise<boolean> {
    return !!(this.config.apiKey || process.env.ANTHROPIC_API_KEY);
  }

  protected async _complete(request: LLMRequest): Promise<LLMResponse> {
    const systemMessage = request.messages.find(m => m.role === 'system');
    const messages: Anthropic.MessageParam[] = request.messages
      .filter(m => m.role !== 'system')
      .map((m): Anthropic.MessageParam => ({
        role: m.role === 'assistant' ? 'assistant' : 'user',
        content: m.content,
      }));

    const params: Anthropic.MessageCreateParamsNonStreaming = {
      model: request.model || this.defaultModel,
      max_tokens: request.maxTokens || 4096,
      messages,
      ...(systemMessage ? { system: systemMessage.content } : {}),
      ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
    };

    const response = await this.getClient().messages.create(params, { signal: request.signal });

    let content = '';
    for (const block of response.content) {
      if (block.type === 'text') {
        content += block.text;
      }
    }

    return {
      content,
      model: response.model,
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
        totalTokens: response.usage.input_tokens + response.usage.output_tokens,
      },
      finishReason: response.stop_reason === 'max_tokens' ? 'length' : 'stop',
      raw: response,
    };
  }
}
