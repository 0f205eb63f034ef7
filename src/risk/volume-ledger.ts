import { createChildLogger } from '../logger.js';
import { VolumeCapExceededError } from '../errors.js';

const log = createChildLogger('volume-ledger');

export interface VolumeReservation {
  readonly symbol: string;
  readonly size: number;
  /** Gives the volume back (order was not placed). No-op after the first call. */
  release(): void;
}

/**
 * Per-symbol executed volume for the current calendar day.
 *
 * `reserve` checks and books in one synchronous step, so two entries racing
 * on the same symbol cannot both pass the cap check. The booking is undone
 * with `release()` when the order is not accepted.
 */
export class DailyVolumeLedger {
  private readonly totals = new Map<string, number>();
  private lastResetDay: string | null = null;
  readonly cap: number;

  constructor(cap: number) {
    this.cap = cap;
  }

  get(symbol: string): number {
    return this.totals.get(symbol) ?? 0;
  }

  snapshot(): Record<string, number> {
    return Object.fromEntries(this.totals);
  }

  /** Throws when the symbol has no room left at all (checked before sizing). */
  assertRoom(symbol: string): void {
    const current = this.get(symbol);
    if (current >= this.cap) throw new VolumeCapExceededError(symbol, current, 0, this.cap);
  }

  reserve(symbol: string, size: number): VolumeReservation {
    const current = this.get(symbol);
    if (current + size > this.cap) {
      log.error({ symbol, current, size, cap: this.cap }, 'Daily volume cap would be exceeded');
      throw new VolumeCapExceededError(symbol, current, size, this.cap);
    }
    this.totals.set(symbol, current + size);
    log.info({ symbol, total: current + size, cap: this.cap }, 'Volume booked');

    let released = false;
    return {
      symbol,
      size,
      release: () => {
        if (released) return;
        released = true;
        this.totals.set(symbol, Math.max(0, this.get(symbol) - size));
        log.info({ symbol, size }, 'Volume booking released');
      },
    };
  }

  /** Clears all totals once per `day` (YYYY-MM-DD); repeated calls for the same day are ignored. */
  resetForDay(day: string): boolean {
    if (this.lastResetDay === day) return false;
    this.lastResetDay = day;
    this.totals.clear();
    log.info({ day }, 'Daily volume ledger reset');
    return true;
  }
}
