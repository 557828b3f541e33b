import { logger } from './logger';

export interface BackoffOptions {
  retries?: number;
  baseDelay?: number;
  /** Return false to rethrow immediately without consuming an attempt. */
  shouldRetry?: (error: unknown) => boolean;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function exponentialBackoff<T>(
  fn: () => Promise<T>,
  { retries = 3, baseDelay = 300, shouldRetry = () => true }: BackoffOptions = {}
): Promise<T> {
  let attempt = 0;

  while (true) {
    try {
      return await fn();
    } catch (err) {
      attempt++;
      if (attempt > retries || !shouldRetry(err)) throw err;

      const wait = baseDelay * Math.pow(2, attempt - 1);
      const reason = err instanceof Error ? err.message : String(err);
      logger.warn(`${reason}. Retrying in ${wait}ms... (attempt ${attempt}/${retries})`);
      await sleep(wait);
    }
  }
}
