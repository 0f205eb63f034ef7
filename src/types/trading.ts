export type Side = 'BUY' | 'SELL';

export interface Quote {
  symbol: string;
  bid: number;
  ask: number;
  /** epoch ms after which the cached quote must not be served */
  expiresAt: number;
}

export interface Position {
  positionId: string;
  symbol: string;
  side: Side;
  entryPrice: number;
  size: number;
  /** epoch ms */
  openTime: number;
}

/** One row of the day's plan as read from disk. */
export interface TradePlanEntry {
  index: number;
  symbol: string;
  side: Side;
  /** HH:MM:SS */
  entryTime: string;
  /** HH:MM:SS */
  exitTime: string;
  /** null = size automatically */
  lotSize: number | null;
}

/** Plan entry with absolute, day-crossing-resolved times (epoch ms). */
export interface ScheduledTrade extends TradePlanEntry {
  entryAt: number;
  exitAt: number;
}

export interface TradeResult {
  symbol: string;
  side: Side;
  entryPrice: number;
  exitPrice: number;
  profitPips: number;
  profitAmount: number;
  lotSize: number;
  /** epoch ms */
  entryTime: number;
  /** epoch ms */
  exitTime: number;
}

export interface AccountAssets {
  balance: number;
  availableAmount: number;
}

export interface OrderReceipt {
  orderId: string;
}

export interface Execution {
  orderId: string;
  positionId: string;
  symbol: string | null;
  side: Side | null;
  price: number;
  size: number;
  fee: number;
  /** epoch ms */
  timestamp: number;
}

export type ExitReason = 'SCHEDULED' | 'STOP_LOSS' | 'TAKE_PROFIT' | 'SWEEP' | 'WATCHDOG' | 'SHUTDOWN';
