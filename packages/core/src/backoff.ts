import { isRetryableError } from './errors';

export interface RetryConfig {
  /** Total attempts including the first one */
  maxAttempts: number;
  baseDelay: number;
  maxDelay: number;
  jitterRange: number;
  isRetryable: (error: unknown) => boolean;
  onRetry?: (attempt: number, delay: number, error: unknown) => void;
  sleep: (ms: number) => Promise<void>;
  random: () => number;
}

export interface RetryResult<T> {
  success: boolean;
  value?: T;
  error?: unknown;
  attempts: number;
}

const DEFAULT_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelay: 1000,
  maxDelay: 32000,
  jitterRange: 250,
  isRetryable: isRetryableError,
  sleep: ms => new Promise(resolve => setTimeout(resolve, ms)),
  random: Math.random,
};

/**
 * Retries an operation with exponential backoff and jitter:
 * delay(n) = min(baseDelay * 2^(n-1), maxDelay) + random * jitterRange.
 * Non-retryable errors end the loop immediately.
 */
export class ExponentialBackoff {
  private readonly config: RetryConfig;

  constructor(config: Partial<RetryConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  async execute<T>(fn: (attempt: number) => Promise<T>): Promise<RetryResult<T>> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.config.maxAttempts; attempt++) {
      try {
        const value = await fn(attempt);
        return { success: true, value, attempts: attempt };
      } catch (error) {
        lastError = error;
        if (attempt >= this.config.maxAttempts || !this.config.isRetryable(error)) {
          return { success: false, error, attempts: attempt };
        }
        const delay = this.calculateDelay(attempt);
        this.config.onRetry?.(attempt, delay, error);
        await this.config.sleep(delay);
      }
    }

    return { success: false, error: lastError, attempts: this.config.maxAttempts };
  }

  calculateDelay(attempt: number): number {
    const base = Math.min(this.config.baseDelay * Math.pow(2, attempt - 1), this.config.maxDelay);
    return base + this.config.random() * this.config.jitterRange;
  }

  getConfig(): RetryConfig {
    return { ...this.config };
  }
}
