export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryOptions {
  attempts: number;
  backoffMs: number;
  isRetryable: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number) => void;
}

/**
 * Run an operation, retrying with linear backoff while the failure is retryable.
 * Non-retryable errors and the error of the final attempt propagate unchanged.
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const attempts = Math.max(1, options.attempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (attempt >= attempts || !options.isRetryable(error)) {
        throw error;
      }
      options.onRetry?.(error, attempt);
      await sleep(options.backoffMs * attempt);
    }
  }
}
