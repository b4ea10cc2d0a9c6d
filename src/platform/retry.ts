export interface RetryOptions {
  /** Total attempts, the first one included. */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitter?: boolean;
  /** Every error is retried when absent. */
  isRetryable?: (error: unknown) => boolean;
  label?: string;
  sleep?: (delayMs: number) => Promise<void>;
  random?: () => number;
}

export function calculateBackoffDelay(attemptNumber: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(baseDelayMs * 2 ** (attemptNumber - 1), maxDelayMs);
}

export function addJitter(delayMs: number, random: () => number = Math.random): number {
  return Math.floor(delayMs * random());
}

const defaultSleep = (delayMs: number): Promise<void> => new Promise((resolve) => {
  setTimeout(resolve, delayMs);
});

export async function withRetry<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const {
    maxAttempts,
    baseDelayMs,
    maxDelayMs,
    jitter = true,
    isRetryable,
    label = 'operation',
    sleep = defaultSleep,
    random = Math.random
  } = options;

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (isRetryable !== undefined && !isRetryable(error)) {
        throw error;
      }

      if (attempt >= maxAttempts) {
        throw error;
      }

      const baseDelay = calculateBackoffDelay(attempt, baseDelayMs, maxDelayMs);
      const delayMs = jitter ? baseDelay + addJitter(baseDelay, random) : baseDelay;

      console.warn('retry_scheduled', {
        label,
        attempt,
        maxAttempts,
        delayMs,
        error: error instanceof Error ? error.message : 'unknown'
      });

      await sleep(delayMs);
    }
  }
}
