/**
 * Rate Limiter - Token bucket shared by every model call in the process
 */

import { config } from '../config';
import { sleep } from './sleep';

export interface RateLimiter {
  acquire(signal?: AbortSignal): Promise<void>;
}

export class TokenBucketRateLimiter implements RateLimiter {
  private tokens: number;
  private readonly capacity: number;
  private readonly refillRate: number; // tokens per second
  private lastRefill: number;

  /**
   * @param capacity - Maximum tokens (burst capacity)
   * @param refillRate - Tokens per second
   */
  constructor(capacity: number, refillRate: number) {
    if (capacity < 1 || refillRate <= 0) {
      throw new RangeError('Rate limiter needs capacity >= 1 and a positive refill rate');
    }
    this.capacity = capacity;
    this.refillRate = refillRate;
    this.tokens = capacity;
    this.lastRefill = Date.now();
  }

  /**
   * Acquire a token, waiting for the bucket to refill when it is empty.
   */
  async acquire(signal?: AbortSignal): Promise<void> {
    this.refill();
    while (this.tokens < 1) {
      const waitTime = Math.ceil(((1 - this.tokens) / this.refillRate) * 1000);
      await sleep(waitTime, signal);
      this.refill();
    }
    this.tokens -= 1;
  }

  availableTokens(): number {
    this.refill();
    return this.tokens;
  }

  private refill(): void {
    const now = Date.now();
    const elapsed = (now - this.lastRefill) / 1000;
    this.tokens = Math.min(this.capacity, this.tokens + elapsed * this.refillRate);
    this.lastRefill = now;
  }
}

let sharedLimiter: TokenBucketRateLimiter | null = null;

/**
 * The process-wide limiter for model calls, sized from configuration.
 */
export function getSharedRateLimiter(): TokenBucketRateLimiter {
  if (!sharedLimiter) {
    sharedLimiter = new TokenBucketRateLimiter(config.llmRateLimitCapacity, config.llmRateLimitPerSecond);
  }
  return sharedLimiter;
}
