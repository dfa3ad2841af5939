/**
 * Bounded retry for transient failures
 */

export interface RetryOptions {
  /** Total attempts, including the first one */
  attempts: number;
  delayMs: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

export async function withRetry<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const { attempts, delayMs, shouldRetry = () => true, onRetry, sleep = defaultSleep } = options;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= attempts || !shouldRetry(error)) {
        throw error;
      }
      onRetry?.(error, attempt);
      await sleep(delayMs);
    }
  }
}
