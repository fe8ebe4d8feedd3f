import { SummarizationError } from './errors.js';
import { getLogger, type Logger } from './logger.js';

export interface RetryOptions {
  /** Total attempts, including the first */
  attempts: number;
  /** Delay before the second attempt; doubles after each failure */
  baseDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
}

export const SUMMARIZATION_RETRY: RetryOptions = {
  attempts: 3,
  baseDelayMs: 1000,
};

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function backoffDelay(baseDelayMs: number, failedAttempt: number): number {
  return baseDelayMs * 2 ** (failedAttempt - 1);
}

/**
 * Run `operation` up to `options.attempts` times with exponential backoff.
 * When every attempt fails, throws a `SummarizationError` for `target`
 * carrying the last failure as its cause.
 */
export async function withRetry<T>(
  target: string,
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = SUMMARIZATION_RETRY,
  logger: Logger = getLogger()
): Promise<T> {
  const wait = options.sleep ?? sleep;
  let lastError: unknown;

  for (let attempt = 1; attempt <= options.attempts; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      lastError = error;
      const reason = error instanceof Error ? error.message : String(error);
      logger.attemptFailed(target, attempt, options.attempts, reason);
      if (attempt < options.attempts) {
        await wait(backoffDelay(options.baseDelayMs, attempt));
      }
    }
  }

  throw new SummarizationError(target, options.attempts, { cause: lastError });
}
