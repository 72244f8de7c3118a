/**
 * Retry utility with exponential backoff and optional jitter
 */

import { isRetryable } from "./errors";

export interface RetryConfig {
  /** Total number of attempts, including the first (default: 3) */
  maxAttempts: number;
  /** Delay before the second attempt in milliseconds (default: 1000) */
  baseDelayMs: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelayMs: number;
  /** Jitter factor 0-1 to randomize delays (default: 0) */
  jitterFactor: number;
  /** Decides whether a failed attempt is worth repeating */
  shouldRetry: (error: Error) => boolean;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterFactor: 0,
  shouldRetry: isRetryable,
};

export interface RetryResult<T> {
  success: boolean;
  data?: T;
  error?: Error;
  attempts: number;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Delay after the given zero-based attempt: baseDelay * 2^attempt,
 * capped and jittered
 */
export function calculateBackoff(
  attempt: number,
  config: Pick<RetryConfig, "baseDelayMs" | "maxDelayMs" | "jitterFactor">,
): number {
  const exponentialDelay = config.baseDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(exponentialDelay, config.maxDelayMs);

  // Random value between -jitter and +jitter
  const jitter = cappedDelay * config.jitterFactor * (Math.random() * 2 - 1);

  return Math.max(0, cappedDelay + jitter);
}

/**
 * Execute a function until it succeeds, a failure is not retryable,
 * or `maxAttempts` attempts have been made. Never throws.
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  config: Partial<RetryConfig> = {},
): Promise<RetryResult<T>> {
  const fullConfig: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...config };
  const maxAttempts = Math.max(1, fullConfig.maxAttempts);
  let lastError: Error | undefined;

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    try {
      const data = await fn(attempt);
      return {
        success: true,
        data,
        attempts: attempt + 1,
      };
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (!fullConfig.shouldRetry(lastError)) {
        return {
          success: false,
          error: lastError,
          attempts: attempt + 1,
        };
      }

      // No sleep after the last attempt
      if (attempt < maxAttempts - 1) {
        await sleep(calculateBackoff(attempt, fullConfig));
      }
    }
  }

  return {
    success: false,
    error: lastError ?? new Error("Retry exhausted"),
    attempts: maxAttempts,
  };
}
