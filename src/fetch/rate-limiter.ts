/**
 * In-process request gate shared by every worker of a harvest run.
 *
 * Request starts are spaced at least 1000 / requestsPerSecond ms apart no matter
 * how many identifiers are in flight. Slots are reserved in call order.
 */
import { defaultSleep, type SleepFn } from '../retry/retry-policy.js';

export const DEFAULT_REQUESTS_PER_SECOND = 2;

export interface RateLimiterOptions {
  requestsPerSecond?: number;
  sleep?: SleepFn;
  now?: () => number;
}

export interface RateGate {
  /** Resolves once the caller may start its request. */
  acquire(): Promise<void>;
}

export class RateLimiter implements RateGate {
  readonly minIntervalMs: number;
  private readonly sleep: SleepFn;
  private readonly now: () => number;
  private nextSlot = 0;

  constructor(options: RateLimiterOptions = {}) {
    const rps = options.requestsPerSecond ?? DEFAULT_REQUESTS_PER_SECOND;
    if (!(rps > 0)) {
      throw new RangeError(`requestsPerSecond must be positive, got ${rps}`);
    }
    this.minIntervalMs = 1000 / rps;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  async acquire(): Promise<void> {
    const now = this.now();
    const slot = Math.max(now, this.nextSlot);
    this.nextSlot = slot + this.minIntervalMs;

    const waitMs = slot - now;
    if (waitMs > 0) {
      await this.sleep(waitMs);
    }
  }
}

/** Gate that never waits. */
export const unlimited: RateGate = {
  acquire: () => Promise.resolve(),
};
