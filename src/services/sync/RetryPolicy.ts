/**
 * Exponential backoff with optional jitter
 */

import { createLogger } from '../../utils/logger';
import { errorMessage } from '../../utils/errors';

export interface RetryPolicyOptions {
  maxRetries: number;
  baseDelayMs: number;
  backoffMultiplier: number;
  maxDelayMs: number;
  jitter: boolean;
}

export const DEFAULT_RETRY_OPTIONS: RetryPolicyOptions = {
  maxRetries: 3,
  baseDelayMs: 1000,
  backoffMultiplier: 2,
  maxDelayMs: 30000,
  jitter: true,
};

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

export class RetryPolicy {
  private logger = createLogger('RetryPolicy');
  readonly options: RetryPolicyOptions;

  constructor(
    options: Partial<RetryPolicyOptions> = {},
    private readonly random: () => number = Math.random,
    private readonly sleep: Sleep = defaultSleep,
  ) {
    this.options = { ...DEFAULT_RETRY_OPTIONS, ...options };
  }

  /**
   * min(maxDelay, base * multiplier^attempt), scaled into [0.9, 1.0] by jitter
   */
  calculateDelay(attempt: number): number {
    const { baseDelayMs, backoffMultiplier, maxDelayMs, jitter } = this.options;
    const exponential = baseDelayMs * Math.pow(backoffMultiplier, attempt);
    const capped = Math.min(maxDelayMs, exponential);
    if (!jitter) {
      return capped;
    }
    return capped * (0.9 + this.random() * 0.1);
  }

  /**
   * Runs the operation up to maxRetries + 1 times, sleeping between attempts.
   * Rethrows the last error.
   */
  async execute<T>(
    operation: () => Promise<T>,
    shouldRetry: (error: unknown) => boolean = () => true,
  ): Promise<T> {
    const { maxRetries } = this.options;

    for (let attempt = 0; ; attempt++) {
      try {
        return await operation();
      } catch (error) {
        if (attempt >= maxRetries || !shouldRetry(error)) {
          throw error;
        }

        const delay = this.calculateDelay(attempt);
        this.logger.warn('Operation failed, retrying', {
          attempt: attempt + 1,
          maxRetries,
          delayMs: Math.round(delay),
          error: errorMessage(error),
        });
        await this.sleep(delay);
      }
    }
  }
}
