import OpenAI from 'openai';
import { BaseLLMProvider } from './base.js';
import type { LLMMessage, LLMRequest, LLMResponse, ProviderConfig } from './types.js';

export class OpenAIProvider extends BaseLLMProvider {
  readonly name = 'openai';
  readonly models = ['gpt-4o', 'gpt-4o-mini'];
  readonly defaultModel = 'gpt-4o';

  private client: OpenAI | null = null;

  constructor(config: ProviderConfig = {}) {
    super(config);
  }

  private getClient(): OpenAI {
    if (!this.client) {
      this.client = new OpenAI({
        apiKey: this.config.apiKey || process.env.OPENAI_API_KEY,
        timeout: this.config.timeout,
        maxRetries: 0,
      });
    }
    return this.client;
  }

  async isAvailable(): Promise<boolean> {
    return !!(this.config.apiKey || process.env.OPENAI_API_KEY);
  }

  protected async _complete(request: LLMRequest): Promise<LLMResponse> {
    const messages = request.messages.map(toChatMessage);

    const response = await this.getClient().chat.completions.create(
      {
        model: request.model || this.defaultModel,
        messages,
        max_tokens: request.maxTokens || 4096,
        ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
        },
      { signal: request.signal },
    );

    const choice = response.choices[0];
    return {
      content: choice?.message.content || '',
      model: response.model,
      usage: {
        inputTokens: response.usage?.prompt_tokens || 0,
        outputTokens: response.usage?.completion_tokens || 0,
        totalTokens: response.usage?.total_tokens || 0,
      },
      finishReason: choice?.finish_reason === 'length' ? 'length' : 'stop',
      raw: response,
    };
  }
}

function toChatMessage(message: LLMMessage): OpenAI.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
  }
}
