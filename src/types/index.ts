export type {
  Side,
  Quote,
  Position,
  TradePlanEntry,
  ScheduledTrade,
  TradeResult,
  AccountAssets,
  OrderReceipt,
  Execution,
  ExitReason,
} from './trading.js';
export type {
  PerformanceMetrics,
  DailyReport,
  HealthCheckResult,
  HealthReport,
  StatusSnapshot,
} from './report.js';
