/**
 * Retry policy for the HTTP client
 */
import { RetryConfig } from '../types/config';

export interface RetryPolicy {
  /** Retries after the first attempt; attempts = maxRetries + 1 */
  maxRetries: number;
  shouldRetryStatus(status: number): boolean;
  /**
   * Delay before the given retry
   * @param retryNumber 1 for the first retry
   */
  backoffMs(retryNumber: number): number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  max_retries: 5,
  backoff_factor: 2,
  status_forcelist: [500, 502, 504],
  backoff_max: 120
};

/**
 * Exponential backoff in seconds: the first retry goes out immediately,
 * retry n waits factor * 2^(n-1), never more than maxSeconds.
 */
export function exponentialBackoff(factor: number, maxSeconds: number): (retryNumber: number) => number {
  return (retryNumber: number) => {
    if (retryNumber <= 1 || factor <= 0) {
      return 0;
    }
    const seconds = Math.min(factor * 2 ** (retryNumber - 1), maxSeconds);
    return seconds * 1000;
  };
}

export function createRetryPolicy(config: RetryConfig = DEFAULT_RETRY_CONFIG): RetryPolicy {
  const retryable = new Set(config.status_forcelist);
  return {
    maxRetries: Math.max(0, config.max_retries),
    shouldRetryStatus: (status: number) => retryable.has(status),
    backoffMs: exponentialBackoff(config.backoff_factor, config.backoff_max)
  };
}
