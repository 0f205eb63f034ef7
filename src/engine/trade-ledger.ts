import { createChildLogger } from '../logger.js';
import type { TradeResult } from '../types/index.js';

const log = createChildLogger('trade-ledger');

/**
 * Closed-trade results for the trading day plus the day's fee total.
 * Results stay until a finalize drains them; lifetime history feeds metrics.
 * Fees are kept per position so a trade rolled past the cutoff keeps its fees.
 */
export class TradeLedger {
  private pendingResults: TradeResult[] = [];
  private readonly lifetime: TradeResult[] = [];
  private readonly owners = new Map<TradeResult, string>();
  private readonly positionFees = new Map<string, number>();
  private unattributedFees = 0;

  record(result: TradeResult, positionId?: string): void {
    this.pendingResults.push(result);
    if (positionId) this.owners.set(result, positionId);
    this.lifetime.push(result);
    log.info(
      { symbol: result.symbol, side: result.side, pips: result.profitPips, amount: result.profitAmount },
      'Trade result recorded',
    );
  }

  addFee(fee: number, positionId?: string): void {
    if (!Number.isFinite(fee)) return;
    if (positionId) this.positionFees.set(positionId, (this.positionFees.get(positionId) ?? 0) + fee);
    else this.unattributedFees += fee;
  }

  get feeTotal(): number {
    let total = this.unattributedFees;
    for (const fee of this.positionFees.values()) total += fee;
    return total;
  }

  pending(): readonly TradeResult[] {
    return this.pendingResults;
  }

  history(): readonly TradeResult[] {
    return this.lifetime;
  }

  lastExitTime(): number | null {
    if (this.pendingResults.length === 0) return null;
    return Math.max(...this.pendingResults.map((r) => r.exitTime));
  }

  /**
   * Removes and returns results that exited before `cutoff`, with their fees
   * and the fees not tied to a position. Later results, and positions still
   * open, roll over with their fees.
   */
  drainBefore(cutoff: number): { results: TradeResult[]; fees: number } {
    const results = this.pendingResults.filter((r) => r.exitTime < cutoff);
    this.pendingResults = this.pendingResults.filter((r) => r.exitTime >= cutoff);

    let fees = this.unattributedFees;
    this.unattributedFees = 0;
    for (const result of results) {
      const positionId = this.owners.get(result);
      if (positionId === undefined) continue;
      this.owners.delete(result);
      fees += this.positionFees.get(positionId) ?? 0;
      this.positionFees.delete(positionId);
    }
    return { results, fees };
  }
}
