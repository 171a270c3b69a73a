export interface RetryOptions {
  attempts?: number;
  baseDelayMs?: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number) => void;
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Simple retry helper with exponential backoff.
 * Retries an async function up to `attempts` times before propagating the error.
 * Errors rejected by `shouldRetry` propagate immediately.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const attempts = Math.max(1, options.attempts ?? 3);
  const baseDelayMs = options.baseDelayMs ?? 500;
  let lastError: unknown;
  for (let attempt = 0; attempt < attempts; attempt++) {
    try {
      return await fn(attempt + 1);
    } catch (error) {
      lastError = error;
      if (attempt === attempts - 1 || (options.shouldRetry && !options.shouldRetry(error))) {
        throw error;
      }
      options.onRetry?.(error, attempt + 1);
      const delay = baseDelayMs * Math.pow(2, attempt);
      if (delay > 0) {
        await sleep(delay);
      }
    }
  }
  throw lastError;
}

export { sleep };
