/**
 * Mock LLM Provider for Testing
 */

import type { LLMProvider, LLMRequest, LLMResponse } from '../../src/providers/types.js';

export class MockProvider implements LLMProvider {
  readonly name = 'mock';
  readonly models = ['mock-model'];
  readonly defaultModel = 'mock-model';
  calls: LLMRequest[] = [];
  private responseIndex = 0;

  constructor(private responses: string[] = ['Mock response']) {}

  async complete(request: LLMRequest): Promise<LLMResponse> {
    this.calls.push(request);
    const content = this.responses[this.responseIndex % this.responses.length];
    this.responseIndex++;
    return {
      content,
      model: 'mock-model',
      usage: { inputTokens: 10, outputTokens: 5, totalTokens: 15 },
      finishReason: 'stop',
    };
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }

  reset(): void {
    this.calls = [];
    this.responseIndex = 0;
  }
}
