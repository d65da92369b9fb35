/**
 * Retry Service
 * Re-runs an operation while a predicate accepts its error. The API client
 * uses it for the single token-refresh retry after a 401.
 */

export interface RetryConfig {
  /** Extra attempts after the first (default: 1) */
  maxRetries: number;
  shouldRetry: (error: unknown, attempt: number) => boolean;
  /** Awaited before the next attempt starts */
  onRetry?: (error: unknown, attempt: number) => void | Promise<void>;
}

export const DEFAULT_MAX_RETRIES = 1;

/**
 * The last error is rethrown unchanged once attempts run out
 */
export async function retry<T>(
  fn: () => Promise<T>,
  options: Partial<RetryConfig> & Pick<RetryConfig, 'shouldRetry'>
): Promise<T> {
  const maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt > maxRetries || !options.shouldRetry(error, attempt)) throw error;
      await options.onRetry?.(error, attempt);
    }
  }
}
