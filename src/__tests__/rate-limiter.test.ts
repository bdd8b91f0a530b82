import { describe, it, expect, vi } from 'vitest';
import { RateLimiter, unlimited } from '../fetch/rate-limiter.js';

describe('fetch/rate-limiter', () => {
  it('spaces request starts by 1000 / requestsPerSecond ms', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const limiter = new RateLimiter({ requestsPerSecond: 2, sleep, now: () => 1_000 });

    await limiter.acquire();
    await limiter.acquire();
    await limiter.acquire();

    expect(limiter.minIntervalMs).toBe(500);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([500, 1_000]);
  });

  it('does not wait once the interval has passed', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    let clock = 0;
    const limiter = new RateLimiter({ requestsPerSecond: 4, sleep, now: () => clock });

    await limiter.acquire();
    clock = 250;
    await limiter.acquire();
    clock = 1_000;
    await limiter.acquire();

    expect(sleep).not.toHaveBeenCalled();
  });

  it('reserves slots in call order for concurrent callers', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const limiter = new RateLimiter({ requestsPerSecond: 10, sleep, now: () => 0 });

    await Promise.all([limiter.acquire(), limiter.acquire(), limiter.acquire()]);

    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
  });

  it('rejects a non-positive rate', () => {
    expect(() => new RateLimiter({ requestsPerSecond: 0 })).toThrow(RangeError);
    expect(() => new RateLimiter({ requestsPerSecond: Number.NaN })).toThrow(RangeError);
  });

  it('unlimited never waits', async () => {
    await expect(unlimited.acquire()).resolves.toBeUndefined();
  });
});
