import type { TradeResult } from './trading.js';

export interface PerformanceMetrics {
  totalTrades: number;
  wins: number;
  losses: number;
  /** percent, 0-100 */
  winRate: number;
  totalPips: number;
  averagePips: number;
  totalAmount: number;
  maxDrawdownPips: number;
  maxDrawdownAmount: number;
  apiCalls: number;
  apiErrors: number;
}

export interface DailyReport {
  /** YYYY-MM-DD */
  date: string;
  results: TradeResult[];
  totalPips: number;
  totalAmount: number;
  totalFee: number;
  balance: number | null;
}

export interface HealthCheckResult {
  name: string;
  ok: boolean;
  detail: string;
}

export interface HealthReport {
  ok: boolean;
  checkedAt: number;
  checks: HealthCheckResult[];
}

export interface StatusSnapshot {
  uptimeMs: number;
  rssMb: number;
  activePositions: number;
  rateLimit: number;
  throttleCount: number;
  pendingResults: number;
  feeTotal: number;
  restarts: number;
  maxRestarts: number;
  volume: Record<string, number>;
}
