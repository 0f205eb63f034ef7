import { createChildLogger } from '../logger.js';
import { systemClock, type Clock, type RandomSource } from '../util/clock.js';
import { KeyedMutex } from '../util/mutex.js';

const log = createChildLogger('rate-limiter');

export interface RateLimitOptions {
  /** requests/sec upper bound and starting value */
  ceiling: number;
  floor: number;
  /** decrease applied after `throttleThreshold` consecutive throttles */
  step: number;
  throttleThreshold: number;
  /** max random extra wait per HTTP method, ms */
  jitterMs: Record<string, number>;
}

export const DEFAULT_RATE_LIMIT: RateLimitOptions = {
  ceiling: 20,
  floor: 5,
  step: 5,
  throttleThreshold: 3,
  jitterMs: { POST: 100, GET: 50 },
};

export interface RateLimitSnapshot {
  currentLimit: number;
  consecutiveThrottles: number;
  totalThrottles: number;
}

/**
 * Adaptive per-method request gate.
 *
 * Each HTTP method keeps its own last-request time; a caller waits until
 * `1/currentLimit` s have passed since the previous call of the same method,
 * plus a small random jitter. Callers of one method are serialized.
 *
 * Throttle signals lower the limit by `step` once `throttleThreshold` of them
 * pile up without enough recoveries in between. The streak counter is not
 * cleared by a decrease: every further throttle while it stays at the
 * threshold lowers the limit again, and each non-throttled response pays the
 * counter down by one. Once it is zero, each non-throttled response raises
 * the limit by one.
 */
export class AdaptiveRateLimiter {
  private limit: number;
  private consecutiveThrottles = 0;
  private totalThrottles = 0;
  private readonly lastRequestAt = new Map<string, number>();
  private readonly gates = new KeyedMutex();
  private readonly options: RateLimitOptions;
  private readonly clock: Clock;
  private readonly random: RandomSource;

  constructor(
    options: Partial<RateLimitOptions> = {},
    clock: Clock = systemClock,
    random: RandomSource = Math.random,
  ) {
    this.options = { ...DEFAULT_RATE_LIMIT, ...options };
    if (this.options.floor > this.options.ceiling) {
      throw new RangeError(`Rate limit floor ${this.options.floor} exceeds ceiling ${this.options.ceiling}`);
    }
    this.limit = this.options.ceiling;
    this.clock = clock;
    this.random = random;
  }

  get currentLimit(): number {
    return this.limit;
  }

  snapshot(): RateLimitSnapshot {
    return {
      currentLimit: this.limit,
      consecutiveThrottles: this.consecutiveThrottles,
      totalThrottles: this.totalThrottles,
    };
  }

  async acquire(method: string): Promise<void> {
    await this.gates.runExclusive(method, async () => {
      const last = this.lastRequestAt.get(method);
      if (last !== undefined) {
        const wait = last + 1000 / this.limit - this.clock.now();
        if (wait > 0) {
          const jitter = this.random() * (this.options.jitterMs[method] ?? 0);
          await this.clock.sleep(wait + jitter);
        }
      }
      this.lastRequestAt.set(method, this.clock.now());
    });
  }

  recordThrottle(): void {
    this.totalThrottles++;
    this.consecutiveThrottles = Math.min(this.consecutiveThrottles + 1, this.options.throttleThreshold);
    if (this.consecutiveThrottles >= this.options.throttleThreshold) {
      const next = Math.max(this.options.floor, this.limit - this.options.step);
      if (next !== this.limit) {
        log.warn({ from: this.limit, to: next }, 'Lowering request rate after repeated throttling');
        this.limit = next;
      }
    }
  }

  recordSuccess(): void {
    if (this.consecutiveThrottles > 0) {
      this.consecutiveThrottles--;
      return;
    }
    if (this.limit < this.options.ceiling) {
      this.limit = Math.min(this.options.ceiling, this.limit + 1);
      log.debug({ limit: this.limit }, 'Request rate recovering');
    }
  }
}
