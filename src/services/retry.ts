/**
 * Retry Service
 * Bounded retry with a fixed delay for transient transport failures
 */

import { isTransportError } from '../lib/http-client.js';
import { loggers } from '../lib/logger.js';
import { retryAttemptsTotal } from '../lib/metrics.js';

export interface RetryConfig {
  /** Maximum number of retry attempts after the first one (default: 2) */
  maxRetries: number;
  /** Delay between attempts in milliseconds (default: 200) */
  delayMs: number;
  /** Metric label for retry attempts */
  operation?: string;
  /** Custom function to determine if error is retryable */
  shouldRetry?: (error: unknown) => boolean;
  /** Callback called on each retry */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export const DEFAULT_RETRY_CONFIG: Pick<RetryConfig, 'maxRetries' | 'delayMs'> = {
  maxRetries: 2,
  delayMs: 200,
};

/**
 * Error thrown when all retry attempts are exhausted
 */
export class RetryError extends Error {
  public readonly code = 'RETRY_EXHAUSTED';
  public readonly originalError: unknown;
  public readonly attempts: number;

  constructor(message: string, originalError: unknown, attempts: number) {
    super(message);
    this.name = 'RetryError';
    this.originalError = originalError;
    this.attempts = attempts;
  }
}

type RetryableFunction<T> = (context: { attempt: number }) => Promise<T>;

/**
 * Execute a function with retry logic
 * Only transport-level failures are retried unless shouldRetry says otherwise.
 * @throws RetryError if all retries are exhausted on a retryable error
 */
export async function retry<T>(
  fn: RetryableFunction<T>,
  config: Partial<RetryConfig> = {}
): Promise<T> {
  // 明確傳入 undefined 的欄位也要回到預設值
  const maxRetries = config.maxRetries ?? DEFAULT_RETRY_CONFIG.maxRetries;
  const delayMs = config.delayMs ?? DEFAULT_RETRY_CONFIG.delayMs;
  const shouldRetry = config.shouldRetry ?? isTransportError;
  const maxAttempts = maxRetries + 1; // 1 initial + maxRetries

  let attempt = 0;

  for (;;) {
    attempt++;

    try {
      return await fn({ attempt });
    } catch (error) {
      if (!shouldRetry(error)) {
        throw error;
      }

      if (attempt >= maxAttempts) {
        // maxRetries 為 0 時沒有任何重試，直接拋出原始錯誤
        if (maxRetries === 0) {
          throw error;
        }
        throw new RetryError(
          `Failed after ${attempt} attempts`,
          error,
          attempt
        );
      }

      if (config.operation) {
        retryAttemptsTotal.inc({ operation: config.operation });
      }
      loggers.retry.debug('Retrying after failure', {
        operation: config.operation,
        attempt,
        maxAttempts,
        delayMs,
      });
      if (config.onRetry) {
        config.onRetry(error, attempt, delayMs);
      }

      await sleep(delayMs);
    }
  }
}

/**
 * Sleep for the specified duration
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
