/**
 * Retry logic with exponential backoff.
 */

import { isRetryableError } from '../errors';

/**
 * Retry configuration.
 */
export interface RetryConfig {
  /** Maximum number of retry attempts after the first try. */
  maxRetries: number;
  /** Initial delay in milliseconds. */
  initialDelayMs: number;
  /** Maximum delay in milliseconds. */
  maxDelayMs: number;
  /** Multiplier for exponential backoff. */
  multiplier: number;
  /** Jitter factor (0-1) for randomizing delays. */
  jitterFactor: number;
}

/**
 * Default retry configuration.
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  initialDelayMs: 500,
  maxDelayMs: 30000,
  multiplier: 2,
  jitterFactor: 0.1,
};

/**
 * Called before each retry with the failed attempt number (0-based), the
 * error, and the delay about to be waited.
 */
export type RetryListener = (attempt: number, error: unknown, delayMs: number) => void;

/**
 * Hooks for time and randomness.
 */
export interface RetryHooks {
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

/**
 * Retry policy for transient failures: server errors and lost connections.
 */
export class RetryPolicy {
  private readonly config: RetryConfig;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(config: Partial<RetryConfig> = {}, hooks: RetryHooks = {}) {
    this.config = { ...DEFAULT_RETRY_CONFIG, ...config };
    this.sleep = hooks.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.random = hooks.random ?? Math.random;
  }

  /**
   * Executes a function, retrying it while it fails with a retryable error.
   *
   * The last error is rethrown unchanged once attempts run out.
   */
  async execute<T>(fn: () => Promise<T>, onRetry?: RetryListener): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await fn();
      } catch (error) {
        if (!this.shouldRetry(error, attempt)) {
          throw error;
        }

        const delay = this.getDelay(attempt);
        onRetry?.(attempt, error, delay);
        await this.sleep(delay);
      }
    }
  }

  /**
   * Delay before retrying after the given failed attempt.
   */
  getDelay(attempt: number): number {
    const baseDelay = this.config.initialDelayMs * Math.pow(this.config.multiplier, attempt);
    const cappedDelay = Math.min(baseDelay, this.config.maxDelayMs);

    const jitter = cappedDelay * this.config.jitterFactor * (this.random() * 2 - 1);
    return Math.max(0, cappedDelay + jitter);
  }

  /**
   * Current configuration.
   */
  getConfig(): Readonly<RetryConfig> {
    return this.config;
  }

  private shouldRetry(error: unknown, attempt: number): boolean {
    if (attempt >= this.config.maxRetries) {
      return false;
    }

    return isRetryableError(error);
  }
}

/**
 * Creates a retry policy.
 */
export function createRetryPolicy(
  config: Partial<RetryConfig> = {},
  hooks: RetryHooks = {}
): RetryPolicy {
  return new RetryPolicy(config, hooks);
}
