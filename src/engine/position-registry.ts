import { createChildLogger } from '../logger.js';
import type { OrderStateMachine } from '../risk/state-machine.js';
import type { ExitReason, Position } from '../types/index.js';

const log = createChildLogger('position-registry');

export interface TrackedPosition {
  position: Position;
  /** plan entry that opened it; null for positions picked up by a sweep or watchdog */
  tradeIndex: number | null;
  /** scheduled exit, epoch ms */
  exitAt: number | null;
  machine: OrderStateMachine | null;
}

/**
 * Positions the engine currently owns, plus the exit claims that make sure
 * one exit path at a time acts on a position.
 *
 * The sweep leaves owned positions alone, so a position opened for a plan
 * entry is only ever closed by its scheduled exit or by SL/TP.
 */
export class PositionRegistry {
  private readonly tracked = new Map<string, TrackedPosition>();
  private readonly claims = new Map<string, ExitReason>();
  private readonly entering = new Map<string, number>();

  track(entry: TrackedPosition): void {
    this.tracked.set(entry.position.positionId, entry);
    log.info(
      { positionId: entry.position.positionId, symbol: entry.position.symbol, tradeIndex: entry.tradeIndex },
      'Position tracked',
    );
  }

  get(positionId: string): TrackedPosition | undefined {
    return this.tracked.get(positionId);
  }

  has(positionId: string): boolean {
    return this.tracked.has(positionId);
  }

  list(): TrackedPosition[] {
    return [...this.tracked.values()];
  }

  get size(): number {
    return this.tracked.size;
  }

  /**
   * Exclusive right to close `positionId`. False when another path holds it.
   */
  claimExit(positionId: string, reason: ExitReason): boolean {
    const holder = this.claims.get(positionId);
    if (holder !== undefined) {
      log.info({ positionId, requested: reason, holder }, 'Exit already claimed');
      return false;
    }
    this.claims.set(positionId, reason);
    return true;
  }

  claimedBy(positionId: string): ExitReason | null {
    return this.claims.get(positionId) ?? null;
  }

  /** Close failed; the position stays tracked and may be claimed again. */
  releaseExit(positionId: string): void {
    this.claims.delete(positionId);
  }

  /** Close succeeded. */
  complete(positionId: string): void {
    this.claims.delete(positionId);
    this.tracked.delete(positionId);
  }

  /** Gives up ownership; the sweep treats the position as unowned from now on. */
  untrack(positionId: string): void {
    this.claims.delete(positionId);
    if (this.tracked.delete(positionId)) log.warn({ positionId }, 'Position released to the sweep');
  }

  beginEntry(symbol: string): void {
    this.entering.set(symbol, (this.entering.get(symbol) ?? 0) + 1);
  }

  endEntry(symbol: string): void {
    const n = (this.entering.get(symbol) ?? 0) - 1;
    if (n > 0) this.entering.set(symbol, n);
    else this.entering.delete(symbol);
  }

  /** An entry for `symbol` is between order placement and tracking. */
  isEntering(symbol: string): boolean {
    return this.entering.has(symbol);
  }
}
