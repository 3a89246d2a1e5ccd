/**
 * LLMOracle — Model Oracle backed by a chat-completion provider.
 *
 * generate() asks the model to critique the latest attempt and write an
 * improved one; score() asks for a 0-100 grade and hands back the raw text.
 */

import type { LLMProvider } from '../providers/types.js';
import { MalformedCompletionError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import type { ModelOracle, OracleCallOptions, OracleCompletion, RawScore } from './types.js';
import { buildRefineMessages, buildScoreMessages, FINAL_ANSWER_MARKER } from './prompts.js';

const logger = getLogger();

export interface LLMOracleConfig {
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

export class LLMOracle implements ModelOracle {
  private provider: LLMProvider;
  private config: LLMOracleConfig;

  constructor(provider: LLMProvider, config: LLMOracleConfig = {}) {
    this.provider = provider;
    this.config = config;
  }

  async generate(history: readonly string[], options: OracleCallOptions = {}): Promise<OracleCompletion> {
    const response = await this.provider.complete({
      messages: buildRefineMessages(history),
      model: this.config.model,
      temperature: this.config.temperature ?? 0.7,
      maxTokens: this.config.maxTokens ?? 2048,
      signal: options.signal,
    });

    const content = parseSolution(response.content);
    if (content.length === 0) {
      throw new MalformedCompletionError('Model returned an empty solution');
    }

    const isFinal = content.includes(FINAL_ANSWER_MARKER);
    logger.debug({ depth: history.length, isFinal, length: content.length }, 'LLMOracle: refinement received');
    return { content, isFinal };
  }

  async score(content: string, problem: string, options: OracleCallOptions = {}): Promise<RawScore> {
    const response = await this.provider.complete({
      messages: buildScoreMessages(content, problem),
      model: this.config.model,
      temperature: 0,
      maxTokens: 16,
      signal: options.signal,
    });
    return response.content.trim();
  }
}

/**
 * Text after the SOLUTION: header, or the whole response when the model
 * ignored the format.
 */
export function parseSolution(raw: string): string {
  const match = raw.match(/SOLUTION:\s*([\s\S]*)$/i);
  return (match ? match[1] : raw).trim();
}
