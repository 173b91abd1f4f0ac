/**
 * Retry Manager with Exponential Backoff
 * Retries provider calls on transient failures with backoff and jitter
 */

import type { RetryConfig } from './types.js';
import { LLMError, LLMErrorType } from './types.js';
import { createModuleLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialBackoffMs: 1000,
  backoffMultiplier: 2,
  maxBackoffMs: 10000,
  jitterFactor: 0.1,
  retryableTypes: [
    LLMErrorType.RATE_LIMIT,
    LLMErrorType.SERVER_ERROR,
    LLMErrorType.NETWORK_ERROR,
    LLMErrorType.TIMEOUT,
  ],
};

/**
 * Plain errors whose message matches one of these are treated as transient
 */
const RETRYABLE_MESSAGE_PATTERNS = [
  'timeout',
  'econnreset',
  'econnrefused',
  'etimedout',
  'eai_again',
  'rate limit',
  'too many requests',
  'service unavailable',
  'bad gateway',
];

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Manages retry logic with exponential backoff and jitter
 */
export class RetryManager {
  private readonly config: RetryConfig;
  private readonly logger: Logger;
  private readonly sleep: Sleep;

  constructor(config?: Partial<RetryConfig>, logger?: Logger, sleep: Sleep = defaultSleep) {
    this.config = { ...DEFAULT_RETRY_CONFIG, ...config };
    this.logger = logger ?? createModuleLogger('llm:retry');
    this.sleep = sleep;
  }

  /**
   * Execute a function with retry logic. Once `signal` is aborted no further
   * attempt starts and the last error is rethrown.
   */
  async execute<T>(fn: () => Promise<T>, context: string, signal?: AbortSignal): Promise<T> {
    let attempt = 0;

    while (true) {
      attempt++;
      signal?.throwIfAborted();

      try {
        return await fn();
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);

        if (!this.isRetryable(error)) {
          this.logger.debug('Non-retryable error encountered', { context, attempt, error: message });
          throw error;
        }

        if (signal?.aborted) {
          this.logger.debug('Retries cancelled', { context, attempt, error: message });
          throw error;
        }

        if (attempt >= this.config.maxAttempts) {
          this.logger.warn('Max retry attempts reached', { context, attempts: attempt, error: message });
          throw error;
        }

        const delay = this.calculateBackoff(attempt);

        this.logger.warn('Retrying after error', {
          context,
          attempt,
          maxAttempts: this.config.maxAttempts,
          delayMs: delay,
          error: message,
        });

        await this.sleep(delay);

        if (signal?.aborted) {
          this.logger.debug('Retries cancelled', { context, attempt, error: message });
          throw error;
        }
      }
    }
  }

  /**
   * Exponential backoff capped at maxBackoffMs, plus or minus jitter
   */
  calculateBackoff(attempt: number): number {
    const baseDelay = Math.min(
      this.config.initialBackoffMs * Math.pow(this.config.backoffMultiplier, attempt - 1),
      this.config.maxBackoffMs
    );

    const jitter = baseDelay * this.config.jitterFactor * (Math.random() * 2 - 1);

    return Math.max(0, Math.round(baseDelay + jitter));
  }

  isRetryable(error: unknown): boolean {
    if (error instanceof LLMError) {
      return error.isRetryable || this.config.retryableTypes.includes(error.type);
    }

    if (!(error instanceof Error)) {
      return false;
    }

    const message = error.message.toLowerCase();
    return RETRYABLE_MESSAGE_PATTERNS.some((pattern) => message.includes(pattern));
  }
}
