/**
 * Token bucket rate limiter unit tests
 */

import { CancelledError, TokenBucketRateLimiter } from '@noi-extract/shared';

describe('TokenBucketRateLimiter', () => {
  it('should reject an invalid configuration', () => {
    expect(() => new TokenBucketRateLimiter(0, 1)).toThrow(RangeError);
    expect(() => new TokenBucketRateLimiter(1, 0)).toThrow(RangeError);
  });

  it('should serve a burst up to capacity without waiting', async () => {
    const limiter = new TokenBucketRateLimiter(3, 1);
    const start = Date.now();

    await limiter.acquire();
    await limiter.acquire();
    await limiter.acquire();

    expect(Date.now() - start).toBeLessThan(50);
    expect(limiter.availableTokens()).toBeLessThan(1);
  });

  it('should wait for a refill once the bucket is empty', async () => {
    const limiter = new TokenBucketRateLimiter(1, 20);
    await limiter.acquire();

    const start = Date.now();
    await limiter.acquire();

    expect(Date.now() - start).toBeGreaterThanOrEqual(40);
  });

  it('should stop waiting when the signal aborts', async () => {
    const limiter = new TokenBucketRateLimiter(1, 0.1);
    await limiter.acquire();
    const controller = new AbortController();

    const pending = limiter.acquire(controller.signal);
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(CancelledError);
  });
});
