import { getLogger } from '../core/logger.js';

export interface RetryOptions {
  /** Total attempts, the first one included. */
  maxAttempts: number;
  baseDelay: number;
  maxDelay: number;
  backoffFactor: number;
  /** Returning false stops retrying and rethrows the error as is. */
  shouldRetry?: (error: Error) => boolean;
  onRetry?: (attempt: number, error: Error) => void;
  signal?: AbortSignal;
}

const DEFAULT_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  baseDelay: 500,
  maxDelay: 8000,
  backoffFactor: 2,
};

export class RetryExhaustedError extends Error {
  constructor(public readonly attempts: number, public readonly lastError: Error) {
    super(`Gave up after ${attempts} attempt(s): ${lastError.message}`);
    this.name = 'RetryExhaustedError';
  }
}

/**
 * Retry a function with exponential backoff and jitter.
 *
 * Errors rejected by `shouldRetry` and aborts propagate unchanged. When every
 * attempt fails the last error is wrapped in a RetryExhaustedError.
 */
export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  options: Partial<RetryOptions> = {},
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const logger = getLogger();
  let lastError: Error = new Error('No attempt made');

  for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
    opts.signal?.throwIfAborted();
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));

      if (opts.signal?.aborted) throw lastError;
      if (opts.shouldRetry && !opts.shouldRetry(lastError)) throw lastError;
      if (attempt === opts.maxAttempts) break;

      // Exponential backoff, jitter scaled to the base delay
      const delay = Math.min(
        opts.baseDelay * Math.pow(opts.backoffFactor, attempt - 1) + Math.random() * opts.baseDelay,
        opts.maxDelay,
      );

      logger.debug({ attempt, delay, error: lastError.message }, 'Retrying after error');

      if (opts.onRetry) {
        opts.onRetry(attempt, lastError);
      }

      await sleep(delay, opts.signal);
    }
  }

  throw new RetryExhaustedError(opts.maxAttempts, lastError);
}

/**
 * Sleep for a given number of milliseconds. Rejects early when the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
