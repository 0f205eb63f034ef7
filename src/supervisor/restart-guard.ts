import { createChildLogger } from '../logger.js';
import type { Clock } from '../util/clock.js';

const log = createChildLogger('restart-guard');

export const RESTART_COOLDOWN_MS = 300_000;
export const MAX_RESTARTS = 5;

export const RESTART_COUNT_ENV = 'RESTART_COUNT';
export const LAST_RESTART_AT_ENV = 'LAST_RESTART_AT';

export type RestartDecision =
  | { status: 'GRANTED'; attempt: number; max: number }
  | { status: 'COOLDOWN'; remainingMs: number }
  | { status: 'EXHAUSTED'; count: number; max: number };

export interface RestartState {
  count: number;
  /** epoch ms */
  lastAt: number | null;
}

/**
 * Auto-restart budget. The cap is checked first, so once it is spent every
 * request is refused as EXHAUSTED regardless of the cooldown.
 */
export class RestartGuard {
  private readonly clock: Clock;
  private readonly max: number;
  private readonly cooldownMs: number;
  private state: RestartState;

  constructor(
    clock: Clock,
    initial: RestartState = { count: 0, lastAt: null },
    options: { max?: number; cooldownMs?: number } = {},
  ) {
    this.clock = clock;
    this.state = { ...initial };
    this.max = options.max ?? MAX_RESTARTS;
    this.cooldownMs = options.cooldownMs ?? RESTART_COOLDOWN_MS;
  }

  /** State carried over from a previous process of the same run. */
  static stateFromEnv(env: NodeJS.ProcessEnv): RestartState {
    const count = Number(env[RESTART_COUNT_ENV]);
    const lastAt = Number(env[LAST_RESTART_AT_ENV]);
    return {
      count: Number.isInteger(count) && count > 0 ? count : 0,
      lastAt: Number.isFinite(lastAt) && lastAt > 0 ? lastAt : null,
    };
  }

  get count(): number {
    return this.state.count;
  }

  get limit(): number {
    return this.max;
  }

  request(): RestartDecision {
    const now = this.clock.now();
    if (this.state.count >= this.max) {
      log.error({ count: this.state.count, max: this.max }, 'Restart budget exhausted');
      return { status: 'EXHAUSTED', count: this.state.count, max: this.max };
    }
    if (this.state.lastAt !== null && now - this.state.lastAt < this.cooldownMs) {
      const remainingMs = this.cooldownMs - (now - this.state.lastAt);
      log.warn({ remainingMs }, 'Restart refused during cooldown');
      return { status: 'COOLDOWN', remainingMs };
    }
    this.state = { count: this.state.count + 1, lastAt: now };
    log.warn({ attempt: this.state.count, max: this.max }, 'Restart granted');
    return { status: 'GRANTED', attempt: this.state.count, max: this.max };
  }

  toEnv(): Record<string, string> {
    return {
      [RESTART_COUNT_ENV]: String(this.state.count),
      [LAST_RESTART_AT_ENV]: String(this.state.lastAt ?? ''),
    };
  }
}
