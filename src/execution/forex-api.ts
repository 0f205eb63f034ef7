import { createChildLogger } from '../logger.js';
import { SignedApiClient, type ApiCallStats } from '../exchange/forex/client.js';
import {
  PRIVATE_ASSETS,
  PRIVATE_CLOSE_ORDER,
  PRIVATE_EXECUTIONS,
  PRIVATE_OPEN_POSITIONS,
  PRIVATE_ORDER,
  PUBLIC_TICKER,
} from '../exchange/forex/endpoints.js';
import {
  assetsSchema,
  executionsSchema,
  orderSchema,
  positionsSchema,
  tickersSchema,
} from '../exchange/forex/schemas.js';
import { QuoteCache } from './quote-cache.js';
import type { Clock } from '../util/clock.js';
import type { AccountAssets, Execution, OrderReceipt, Position, Quote, Side } from '../types/index.js';

const log = createChildLogger('forex-api');

export interface QuoteOptions {
  /** Skip the cache and fetch from the exchange. */
  fresh?: boolean;
}

/**
 * Everything the engine needs from the exchange. Implemented over
 * SignedApiClient in production and by an in-memory fake in tests.
 */
export interface ForexApi {
  getAssets(): Promise<AccountAssets>;
  /** Cached up to 5 s unless `fresh`; symbols without a quote are absent from the map. */
  getQuotes(symbols: readonly string[], options?: QuoteOptions): Promise<Map<string, Quote>>;
  placeMarketOrder(symbol: string, side: Side, size: number): Promise<OrderReceipt>;
  /** `side` is the closing side (opposite of the position's). */
  closePosition(symbol: string, side: Side, positionId: string, size: number): Promise<OrderReceipt>;
  getExecutions(orderId: string): Promise<Execution[]>;
  getOpenPositions(symbol?: string): Promise<Position[]>;
  stats(): ApiCallStats;
}

export function closingSide(side: Side): Side {
  return side === 'BUY' ? 'SELL' : 'BUY';
}

function parseTimestamp(text: string | undefined, fallback: number): number {
  if (!text) return fallback;
  const t = Date.parse(text);
  return Number.isNaN(t) ? fallback : t;
}

/**
 * Forex private REST API
 *
 *   GET  /v1/account/assets  balance
 *   GET  /v1/ticker          quotes (public, batched)
 *   POST /v1/order           market order
 *   POST /v1/closeOrder      close a position
 *   GET  /v1/executions      fills for an order
 *   GET  /v1/openPositions   open positions
 */
export class ForexRestApi implements ForexApi {
  private readonly client: SignedApiClient;
  private readonly quotes: QuoteCache;
  private readonly clock: Clock;

  constructor(client: SignedApiClient, clock: Clock, quoteTtlMs?: number) {
    this.client = client;
    this.clock = clock;
    this.quotes = new QuoteCache((symbols) => this.fetchTickers(symbols), quoteTtlMs, clock);
  }

  async getAssets(): Promise<AccountAssets> {
    return this.client.call('GET', PRIVATE_ASSETS, assetsSchema);
  }

  getQuotes(symbols: readonly string[], options?: QuoteOptions): Promise<Map<string, Quote>> {
    return this.quotes.getQuotes(symbols, options?.fresh ?? false);
  }

  async placeMarketOrder(symbol: string, side: Side, size: number): Promise<OrderReceipt> {
    const body = { symbol, side, size: String(size), executionType: 'MARKET' };
    const receipt = await this.client.call('POST', PRIVATE_ORDER, orderSchema, { body });
    log.info({ symbol, side, size, orderId: receipt.orderId }, 'Market order accepted');
    return receipt;
  }

  async closePosition(symbol: string, side: Side, positionId: string, size: number): Promise<OrderReceipt> {
    const body = {
      symbol,
      side,
      executionType: 'MARKET',
      settlePosition: [{ positionId: /^\d+$/.test(positionId) ? Number(positionId) : positionId, size: String(size) }],
    };
    const receipt = await this.client.call('POST', PRIVATE_CLOSE_ORDER, orderSchema, { body });
    log.info({ symbol, side, positionId, size, orderId: receipt.orderId }, 'Close order accepted');
    return receipt;
  }

  async getExecutions(orderId: string): Promise<Execution[]> {
    const items = await this.client.call('GET', PRIVATE_EXECUTIONS, executionsSchema, {
      query: { orderId },
    });
    const now = this.clock.now();
    return items.map((e) => ({
      orderId: e.orderId ?? orderId,
      positionId: e.positionId,
      symbol: e.symbol ?? null,
      side: e.side ?? null,
      price: e.price,
      size: e.size ?? 0,
      fee: e.fee ?? 0,
      timestamp: parseTimestamp(e.timestamp, now),
    }));
  }

  async getOpenPositions(symbol?: string): Promise<Position[]> {
    const items = await this.client.call('GET', PRIVATE_OPEN_POSITIONS, positionsSchema, {
      query: symbol ? { symbol } : {},
    });
    const now = this.clock.now();
    return items.map((p) => ({
      positionId: p.positionId,
      symbol: p.symbol,
      side: p.side,
      entryPrice: p.price,
      size: p.size,
      openTime: parseTimestamp(p.timestamp, now),
    }));
  }

  stats(): ApiCallStats {
    return this.client.stats();
  }

  private fetchTickers(symbols: string[]) {
    return this.client.call('GET', PUBLIC_TICKER, tickersSchema, {
      query: { symbol: symbols.join(',') },
      visibility: 'public',
    });
  }
}
