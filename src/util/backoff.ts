/**
 * Exponential backoff utility with jitter for source API calls
 */

import { logger, errorMessage } from './logger.js';

export interface BackoffOptions {
  maxRetries?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  jitterFactor?: number;
  /** Return false to fail fast on errors that will not heal (e.g. HTTP 404) */
  shouldRetry?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
}

export class BackoffError extends Error {
  constructor(message: string, public attempts: number) {
    super(message);
    this.name = 'BackoffError';
  }
}

/**
 * Execute a function with exponential backoff retry logic
 */
export async function withBackoff<T>(
  fn: () => Promise<T>,
  options: BackoffOptions = {}
): Promise<T> {
  const {
    maxRetries = 4,
    initialDelayMs = 1000,
    maxDelayMs = 30000,
    jitterFactor = 0.1,
    shouldRetry = () => true,
    sleep: wait = sleep,
  } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!shouldRetry(error)) {
        throw error;
      }

      if (attempt >= maxRetries) {
        logger.error(`Max retries (${maxRetries}) exceeded`, {
          error: errorMessage(error),
          attempts: attempt + 1,
        });
        throw new BackoffError(
          `Failed after ${attempt + 1} attempts: ${errorMessage(error)}`,
          attempt + 1
        );
      }

      const baseDelay = Math.min(initialDelayMs * Math.pow(2, attempt), maxDelayMs);
      const jitter = baseDelay * jitterFactor * Math.random();
      const delay = Math.floor(baseDelay + jitter);

      logger.warn(`Attempt ${attempt + 1} failed, retrying in ${delay}ms`, {
        error: errorMessage(error),
        attempt: attempt + 1,
        maxRetries,
        delay,
      });

      await wait(delay);
    }
  }
}

/**
 * Sleep for the specified number of milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Parse Retry-After header value (seconds or HTTP date)
 */
export function parseRetryAfter(retryAfter: string, now: Date = new Date()): number | undefined {
  const seconds = parseInt(retryAfter, 10);
  if (!isNaN(seconds)) {
    return seconds;
  }

  const date = new Date(retryAfter);
  if (!isNaN(date.getTime())) {
    const diffMs = date.getTime() - now.getTime();
    return Math.max(0, Math.ceil(diffMs / 1000));
  }

  return undefined;
}
