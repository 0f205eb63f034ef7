import type { ApiCallStats } from '../exchange/forex/client.js';
import type { PerformanceMetrics, TradeResult } from '../types/index.js';

/** Recomputed on demand from the trade history; nothing is cached. */
export function collectMetrics(results: readonly TradeResult[], api: ApiCallStats): PerformanceMetrics {
  const wins = results.filter((r) => r.profitPips > 0).length;
  const totalPips = results.reduce((s, r) => s + r.profitPips, 0);
  const totalAmount = results.reduce((s, r) => s + r.profitAmount, 0);

  return {
    totalTrades: results.length,
    wins,
    losses: results.length - wins,
    winRate: results.length > 0 ? (wins / results.length) * 100 : 0,
    totalPips,
    averagePips: results.length > 0 ? totalPips / results.length : 0,
    totalAmount,
    maxDrawdownPips: calcMaxDrawdown(results.map((r) => r.profitPips)),
    maxDrawdownAmount: calcMaxDrawdown(results.map((r) => r.profitAmount)),
    apiCalls: api.calls,
    apiErrors: api.errors,
  };
}

/**
 * Largest fall of the running total below its peak. The peak starts at 0,
 * so an opening loss counts as drawdown.
 */
export function calcMaxDrawdown(changes: readonly number[]): number {
  let running = 0;
  let peak = 0;
  let maxDd = 0;
  for (const change of changes) {
    running += change;
    if (running > peak) peak = running;
    const dd = peak - running;
    if (dd > maxDd) maxDd = dd;
  }
  return maxDd;
}

/** null when no call was made yet */
export function apiSuccessRate(metrics: PerformanceMetrics): number | null {
  if (metrics.apiCalls === 0) return null;
  return ((metrics.apiCalls - metrics.apiErrors) / metrics.apiCalls) * 100;
}
