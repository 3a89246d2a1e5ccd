/**
 * Model Oracle — the only way the search core talks to a language model.
 *
 * Implementations may fail transiently (throw); the core retries per its
 * retry policy. Throw MalformedCompletionError for answers that can never
 * become trajectory content, so they are not retried.
 */
export interface ModelOracle {
  /**
   * Produce a refined candidate from the trajectory so far. `history` holds
   * the root-to-node contents in order, `history[0]` is the problem statement.
   */
  generate(history: readonly string[], options?: OracleCallOptions): Promise<OracleCompletion>;

  /** Raw quality estimate for `content`, normalized by the Evaluator. */
  score(content: string, problem: string, options?: OracleCallOptions): Promise<RawScore>;
}

export interface OracleCompletion {
  content: string;
  /** The trajectory reached a final answer; no refinement follows it. */
  isFinal: boolean;
}

export type RawScore = number | string;

export interface OracleCallOptions {
  signal?: AbortSignal;
}
