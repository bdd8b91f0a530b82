/**
 * Bounded retry with slowly-growing backoff.
 *
 * delay(attempt) = baseDelayMs + log2(attempt) * scaleMs, where `attempt` is the
 * 1-based retry count. With a large attempt budget this stays close to flat
 * instead of growing exponentially.
 */
import { logger } from '../logger.js';
import { RetryExhaustedError, isTransientError } from './errors.js';

export const DEFAULT_MAX_ATTEMPTS = 623;
export const DEFAULT_BASE_DELAY_MS = 60_000;
export const DEFAULT_SCALE_MS = 10_000;

export type SleepFn = (ms: number) => Promise<void>;

export interface RetryPolicyOptions {
  /** Total invocations allowed, including the first one */
  maxAttempts?: number;
  baseDelayMs?: number;
  scaleMs?: number;
  /** Injected for tests; defaults to setTimeout */
  sleep?: SleepFn;
}

export const defaultSleep: SleepFn = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export class RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly scaleMs: number;
  private readonly sleep: SleepFn;

  constructor(options: RetryPolicyOptions = {}) {
    this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    this.baseDelayMs = options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
    this.scaleMs = options.scaleMs ?? DEFAULT_SCALE_MS;
    this.sleep = options.sleep ?? defaultSleep;

    if (!Number.isInteger(this.maxAttempts) || this.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${this.maxAttempts}`);
    }
    if (this.baseDelayMs < 0 || this.scaleMs < 0) {
      throw new RangeError('baseDelayMs and scaleMs must be non-negative');
    }
  }

  /** Delay before the given 1-based retry. */
  delayFor(attempt: number): number {
    if (attempt < 1) {
      throw new RangeError(`attempt is 1-based, got ${attempt}`);
    }
    return this.baseDelayMs + Math.log2(attempt) * this.scaleMs;
  }

  /**
   * Run an operation, retrying transient transport failures.
   * Non-transient errors propagate on first occurrence. After `maxAttempts`
   * consecutive transient failures a RetryExhaustedError is thrown; there is no
   * sleep after the final attempt.
   */
  async run<T>(operation: () => Promise<T> | T, label = 'operation'): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await operation();
      } catch (error) {
        if (!isTransientError(error)) throw error;
        if (attempt >= this.maxAttempts) {
          throw new RetryExhaustedError(label, attempt, error);
        }

        const delayMs = this.delayFor(attempt);
        logger.warn(
          { label, attempt, maxAttempts: this.maxAttempts, delayMs, error: String(error) },
          'Transient failure, backing off'
        );
        await this.sleep(delayMs);
      }
    }
  }
}
