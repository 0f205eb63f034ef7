/**
 * Time source for everything that waits or timestamps.
 * Production uses the wall clock; tests pass a clock that advances on sleep.
 */
export interface Clock {
  /** epoch ms */
  now(): number;
  sleep(ms: number): Promise<void>;
}

/** Returns a float in [0, 1). */
export type RandomSource = () => number;

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((r) => setTimeout(r, Math.max(0, ms))),
};

export async function sleepUntil(clock: Clock, at: number): Promise<void> {
  const ms = at - clock.now();
  if (ms > 0) await clock.sleep(ms);
}

/** Uniform float in [0, max). */
export function uniform(random: RandomSource, max: number): number {
  return random() * max;
}
