import pino from 'pino';
import { ValidationError, errorMessage } from './errors.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

export interface RetryPolicy {
  attempts: number;
  delayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  attempts: 3,
  delayMs: 1000,
};

export interface RetryOptions extends Partial<RetryPolicy> {
  label?: string;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run fn until it resolves or the attempt ceiling is reached.
 *
 * Fixed delay between attempts, no backoff. ValidationError is thrown straight
 * through. When every attempt fails the last underlying error is rethrown as is.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const attempts = Math.max(1, options.attempts ?? DEFAULT_RETRY_POLICY.attempts);
  const delayMs = Math.max(0, options.delayMs ?? DEFAULT_RETRY_POLICY.delayMs);
  const label = options.label || 'operation';

  let lastError: unknown;
  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (error instanceof ValidationError) {
        throw error;
      }
      lastError = error;
      logger.warn(
        {
          event: 'retry.attempt.fail',
          label,
          attempt,
          attempts,
          error: errorMessage(error),
        },
        `${label} failed (attempt ${attempt}/${attempts})`
      );
      if (attempt < attempts && delayMs > 0) {
        await sleep(delayMs);
      }
    }
  }

  throw lastError;
}
