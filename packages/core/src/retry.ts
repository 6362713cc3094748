/**
 * Exponential-backoff retry around fallible async operations
 */

import type { Logger } from "./logger.js";

export type RetryConfig = {
  /** When false the operation runs exactly once */
  enabled: boolean;
  /** Retries after the first attempt */
  maxRetries: number;
  /** Delay before the first retry, in ms */
  initialDelay: number;
  /** Upper bound for any single delay, in ms */
  maxDelay: number;
  exponentialBase: number;
  /** Errors for which another attempt is made */
  retryable: (error: unknown) => boolean;
};

export const DEFAULT_RETRY_CONFIG: Readonly<RetryConfig> = Object.freeze({
  enabled: true,
  maxRetries: 3,
  initialDelay: 1000,
  maxDelay: 60000,
  exponentialBase: 2,
  retryable: () => true,
});

export function createRetryConfig(
  overrides: Partial<RetryConfig> = {}
): Readonly<RetryConfig> {
  return Object.freeze({ ...DEFAULT_RETRY_CONFIG, ...overrides });
}

/**
 * Delay before retry number `attempt + 1` (attempt counts from 0)
 */
export function calculateDelay(config: RetryConfig, attempt: number): number {
  const delay = config.initialDelay * Math.pow(config.exponentialBase, attempt);
  return Math.min(delay, config.maxDelay);
}

/**
 * Raised once every attempt has failed with a retryable error
 */
export class RetryExhaustedError extends Error {
  readonly lastError: unknown;
  readonly attempts: number;

  constructor(lastError: unknown, attempts: number) {
    const reason = lastError instanceof Error ? lastError.message : String(lastError);
    super(`Retry failed after ${attempts} attempts. Last error: ${reason}`);
    this.name = "RetryExhaustedError";
    this.lastError = lastError;
    this.attempts = attempts;
  }
}

export type RetryOptions = {
  onRetry?: (error: unknown, attempt: number) => void;
  logger?: Logger;
  /** Operation name used in log lines */
  label?: string;
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function withRetry<T>(
  operation: () => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  options: RetryOptions = {}
): Promise<T> {
  if (!config.enabled) {
    return operation();
  }

  const label = options.label ?? "operation";

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (!config.retryable(error)) {
        throw error;
      }
      if (attempt >= config.maxRetries) {
        options.logger?.error(
          `${label} failed, reached maximum retry count ${config.maxRetries}`
        );
        throw new RetryExhaustedError(error, attempt + 1);
      }

      const delay = calculateDelay(config, attempt);
      const reason = error instanceof Error ? error.message : String(error);
      options.logger?.warn(
        `${label} attempt ${attempt + 1} failed: ${reason}; retrying in ${(delay / 1000).toFixed(2)}s`
      );
      options.onRetry?.(error, attempt + 1);
      await sleep(delay);
    }
  }
}
