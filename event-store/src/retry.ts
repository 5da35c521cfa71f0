import { ConcurrencyError } from './errors.js';

export interface RetryOptions {
  maxAttempts?: number;
  retryDelayMs?: number;
  onRetry?: (attempt: number, error: ConcurrencyError, nextDelayMs: number) => void;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Re-runs `operation` while it fails with ConcurrencyError, with linear backoff.
 * The operation must reload its state on every attempt. Any other error
 * propagates immediately; after maxAttempts the last ConcurrencyError does.
 */
export async function withConcurrencyRetry<T>(
  operation: () => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const maxAttempts = options.maxAttempts ?? 3;
  const retryDelayMs = options.retryDelayMs ?? 25;
  let attempt = 0;
  while (true) {
    attempt++;
    try {
      return await operation();
    } catch (err) {
      if (!(err instanceof ConcurrencyError) || attempt >= maxAttempts) throw err;
      const nextDelayMs = retryDelayMs * attempt;
      options.onRetry?.(attempt, err, nextDelayMs);
      await sleep(nextDelayMs);
    }
  }
}
