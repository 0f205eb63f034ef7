import { systemClock, type Clock, type RandomSource } from './clock.js';

export interface RetryOptions {
  /** total tries including the first */
  attempts: number;
  delayMs: number;
  /** 1 = fixed interval */
  backoffFactor?: number;
  maxDelayMs?: number;
  /** uniform random extra delay added to each wait */
  jitterMs?: number;
  /** errors for which another attempt is allowed; default: all */
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

/**
 * Bounded retry with optional exponential backoff.
 * One instance per call-site policy; reused across calls.
 */
export class RetryPolicy {
  readonly attempts: number;
  private readonly options: RetryOptions;
  private readonly clock: Clock;
  private readonly random: RandomSource;

  constructor(options: RetryOptions, clock: Clock = systemClock, random: RandomSource = Math.random) {
    this.attempts = Math.max(1, options.attempts);
    this.options = options;
    this.clock = clock;
    this.random = random;
  }

  /** Wait before attempt `attempt + 1` (attempt is 1-based). */
  delayFor(attempt: number): number {
    const factor = this.options.backoffFactor ?? 1;
    const base = Math.max(0, this.options.delayMs) * Math.pow(factor, attempt - 1);
    const jitter = (this.options.jitterMs ?? 0) * this.random();
    const max = this.options.maxDelayMs ?? Number.POSITIVE_INFINITY;
    return Math.min(max, base + jitter);
  }

  async run<T>(operation: (attempt: number) => Promise<T>): Promise<T> {
    let attempt = 0;
    for (;;) {
      attempt += 1;
      try {
        return await operation(attempt);
      } catch (error) {
        const retryable = this.options.shouldRetry?.(error) ?? true;
        if (!retryable || attempt >= this.attempts) throw error;
        const delay = this.delayFor(attempt);
        this.options.onRetry?.(error, attempt, delay);
        if (delay > 0) await this.clock.sleep(delay);
      }
    }
  }

  /**
   * Repeats until `operation` yields a non-null value.
   * Retryable errors count as a miss; others propagate. Null when exhausted.
   */
  async poll<T>(operation: (attempt: number) => Promise<T | null>): Promise<T | null> {
    for (let attempt = 1; attempt <= this.attempts; attempt++) {
      try {
        const value = await operation(attempt);
        if (value !== null) return value;
      } catch (error) {
        const retryable = this.options.shouldRetry?.(error) ?? true;
        if (!retryable) throw error;
        this.options.onRetry?.(error, attempt, this.delayFor(attempt));
      }
      if (attempt < this.attempts) {
        const delay = this.delayFor(attempt);
        if (delay > 0) await this.clock.sleep(delay);
      }
    }
    return null;
  }
}
