/**
 * Rate Limiter for LLM API Requests
 * Sliding window over the timestamps of recent requests
 */

import type { RateLimitConfig } from './types.js';
import type { Sleep } from './retry.js';
import { createModuleLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';

export type Clock = () => number;

export class RateLimiter {
  private readonly config: RateLimitConfig;
  private readonly logger: Logger;
  private readonly requestTimestamps: number[] = [];
  private readonly now: Clock;
  private readonly sleep: Sleep;

  constructor(
    config?: Partial<RateLimitConfig>,
    logger?: Logger,
    clock: { now?: Clock; sleep?: Sleep } = {}
  ) {
    this.config = {
      maxRequests: config?.maxRequests ?? 60,
      windowMs: config?.windowMs ?? 60000,
      enabled: config?.enabled ?? true,
    };
    this.logger = logger ?? createModuleLogger('llm:rate-limiter');
    this.now = clock.now ?? Date.now;
    this.sleep = clock.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
  }

  /**
   * Acquire a slot for making a request, waiting while the window is full
   */
  async acquireSlot(): Promise<void> {
    if (!this.config.enabled) {
      return;
    }

    let waitTime = this.getTimeUntilNextSlot();

    while (waitTime > 0) {
      this.logger.debug('Rate limit reached, waiting', {
        waitTimeMs: waitTime,
        maxRequests: this.config.maxRequests,
        windowMs: this.config.windowMs,
      });

      await this.sleep(waitTime);
      waitTime = this.getTimeUntilNextSlot();
    }

    this.requestTimestamps.push(this.now());
  }

  getAvailableSlots(): number {
    if (!this.config.enabled) {
      return Infinity;
    }

    this.cleanupOldTimestamps(this.now());
    return Math.max(0, this.config.maxRequests - this.requestTimestamps.length);
  }

  /**
   * Milliseconds until a slot frees up; 0 when one is available now
   */
  getTimeUntilNextSlot(): number {
    if (!this.config.enabled) {
      return 0;
    }

    const now = this.now();
    this.cleanupOldTimestamps(now);

    if (this.requestTimestamps.length < this.config.maxRequests) {
      return 0;
    }

    const oldestTimestamp = this.requestTimestamps[0];
    if (oldestTimestamp === undefined) {
      return 0;
    }
    return Math.max(0, oldestTimestamp + this.config.windowMs - now);
  }

  reset(): void {
    this.requestTimestamps.length = 0;
  }

  /**
   * Drop timestamps that fell out of the window
   */
  private cleanupOldTimestamps(now: number): void {
    const cutoff = now - this.config.windowMs;
    while (this.requestTimestamps.length > 0) {
      const oldestTimestamp = this.requestTimestamps[0];
      if (oldestTimestamp === undefined || oldestTimestamp > cutoff) {
        break;
      }
      this.requestTimestamps.shift();
    }
  }
}
