/**
 * Retry executor with exponential backoff.
 * @module pipeline/retry
 */

import { toError } from '../errors.js';

/**
 * Retry settings.
 */
export interface RetryConfig {
  /** Attempts after the first one */
  maxRetries: number;
  initialBackoffMs: number;
  maxBackoffMs: number;
  backoffMultiplier: number;
  /** Fraction of the delay added as random jitter */
  jitterFactor: number;
}

/**
 * Retry hook callbacks.
 */
export interface RetryHooks {
  /** Called before each retry attempt */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  /** Called when all retries are exhausted */
  onExhausted?: (error: Error, attempts: number) => void;
  /** Decides whether an error is worth another attempt; every error is by default */
  shouldRetry?: (error: Error) => boolean;
}

/**
 * Runs an operation until it succeeds or its retries run out.
 */
export class RetryExecutor {
  constructor(
    private readonly config: RetryConfig,
    private readonly hooks: RetryHooks = {}
  ) {}

  /**
   * Executes an operation with retry logic.
   * @throws the last error once retries are exhausted
   */
  async execute<T>(operation: () => Promise<T>): Promise<T> {
    const attempts = this.config.maxRetries + 1;

    for (let attempt = 1; ; attempt++) {
      try {
        return await operation();
      } catch (error) {
        const err = toError(error);

        if (this.hooks.shouldRetry && !this.hooks.shouldRetry(err)) {
          throw err;
        }
        if (attempt >= attempts) {
          this.hooks.onExhausted?.(err, attempt);
          throw err;
        }

        const delayMs = this.calculateDelay(attempt);
        this.hooks.onRetry?.(attempt, err, delayMs);
        await this.sleep(delayMs);
      }
    }
  }

  private calculateDelay(attempt: number): number {
    // base * multiplier^(attempt-1), capped, plus jitter
    const exponentialDelay =
      this.config.initialBackoffMs * Math.pow(this.config.backoffMultiplier, attempt - 1);
    const cappedDelay = Math.min(exponentialDelay, this.config.maxBackoffMs);
    const jitter = cappedDelay * this.config.jitterFactor * Math.random();
    return Math.floor(cappedDelay + jitter);
  }

  private sleep(ms: number): Promise<void> {
    if (ms <= 0) {
      return Promise.resolve();
    }
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}

/**
 * Creates a retry executor, filling unset values with defaults.
 */
export function createRetryExecutor(
  config: Partial<RetryConfig> = {},
  hooks: RetryHooks = {}
): RetryExecutor {
  return new RetryExecutor(
    {
      maxRetries: config.maxRetries ?? 2,
      initialBackoffMs: config.initialBackoffMs ?? 1000,
      maxBackoffMs: config.maxBackoffMs ?? 30000,
      backoffMultiplier: config.backoffMultiplier ?? 2,
      jitterFactor: config.jitterFactor ?? 0.1,
    },
    hooks
  );
}
