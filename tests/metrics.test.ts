import { describe, it, expect } from 'vitest';
import { apiSuccessRate, calcMaxDrawdown, collectMetrics } from '../src/report/metrics.js';
import { tradeResult } from './helpers/results.js';

describe('metrics', () => {
  it('should compute metrics from known trades', () => {
    const results = [
      tradeResult({ profitPips: 20, profitAmount: 2000 }),
      tradeResult({ profitPips: -30, profitAmount: -3000 }),
      tradeResult({ profitPips: 10, profitAmount: 1000 }),
      tradeResult({ profitPips: 0, profitAmount: 0 }),
    ];

    const metrics = collectMetrics(results, { calls: 40, errors: 2 });

    expect(metrics).toEqual({
      totalTrades: 4,
      wins: 2,
      losses: 2,
      winRate: 50,
      totalPips: 0,
      averagePips: 0,
      totalAmount: 0,
      maxDrawdownPips: 30,
      maxDrawdownAmount: 3000,
      apiCalls: 40,
      apiErrors: 2,
    });
    expect(apiSuccessRate(metrics)).toBeCloseTo(95, 10);
  });

  it('should handle no trades', () => {
    const metrics = collectMetrics([], { calls: 0, errors: 0 });

    expect(metrics.totalTrades).toBe(0);
    expect(metrics.winRate).toBe(0);
    expect(metrics.averagePips).toBe(0);
    expect(apiSuccessRate(metrics)).toBeNull();
  });

  it('should measure drawdown from the running peak', () => {
    expect(calcMaxDrawdown([10, -5, 20, -15, -10, 5])).toBe(25);
  });

  it('should count an opening loss as drawdown', () => {
    expect(calcMaxDrawdown([-10, 5])).toBe(10);
  });

  it('should report zero drawdown for a rising series', () => {
    expect(calcMaxDrawdown([1, 2, 3])).toBe(0);
  });
});
