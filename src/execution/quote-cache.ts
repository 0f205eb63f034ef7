import { createChildLogger } from '../logger.js';
import { systemClock, type Clock } from '../util/clock.js';
import { Mutex } from '../util/mutex.js';
import type { TickerItem } from '../exchange/forex/schemas.js';
import type { Quote } from '../types/index.js';

const log = createChildLogger('quote-cache');

export const QUOTE_TTL_MS = 5_000;

export type QuoteFetcher = (symbols: string[]) => Promise<TickerItem[]>;

/**
 * Short-TTL quote cache keyed by symbol. Misses and expired entries are
 * refreshed in one batched fetch; concurrent refreshes are serialized so a
 * burst of callers triggers one request.
 */
export class QuoteCache {
  private readonly entries = new Map<string, Quote>();
  private readonly refreshLock = new Mutex();
  private readonly fetcher: QuoteFetcher;
  private readonly ttlMs: number;
  private readonly clock: Clock;

  constructor(fetcher: QuoteFetcher, ttlMs: number = QUOTE_TTL_MS, clock: Clock = systemClock) {
    this.fetcher = fetcher;
    this.ttlMs = ttlMs;
    this.clock = clock;
  }

  /**
   * Quotes for the requested symbols; symbols the exchange omitted are absent.
   * `bypass` refetches every symbol even when its cached quote is still live.
   */
  async getQuotes(symbols: readonly string[], bypass = false): Promise<Map<string, Quote>> {
    const wanted = [...new Set(symbols)];
    const stale = bypass ? wanted : wanted.filter((s) => !this.fresh(s));
    if (stale.length > 0) {
      await this.refreshLock.runExclusive(async () => {
        // another caller may have refreshed while we waited
        const still = bypass ? stale : stale.filter((s) => !this.fresh(s));
        if (still.length === 0) return;
        const items = await this.fetcher(still);
        const expiresAt = this.clock.now() + this.ttlMs;
        if (bypass) for (const s of still) this.entries.delete(s);
        for (const t of items) {
          this.entries.set(t.symbol, { symbol: t.symbol, bid: t.bid, ask: t.ask, expiresAt });
        }
        const missing = still.filter((s) => !items.some((t) => t.symbol === s));
        if (missing.length > 0) log.warn({ missing }, 'Ticker response omitted symbols');
      });
    }
    const out = new Map<string, Quote>();
    for (const s of wanted) {
      const q = this.fresh(s);
      if (q) out.set(s, q);
    }
    return out;
  }

  async getQuote(symbol: string): Promise<Quote | null> {
    const quotes = await this.getQuotes([symbol]);
    return quotes.get(symbol) ?? null;
  }

  invalidate(symbol?: string): void {
    if (symbol) this.entries.delete(symbol);
    else this.entries.clear();
  }

  private fresh(symbol: string): Quote | null {
    const q = this.entries.get(symbol);
    if (!q) return null;
    if (q.expiresAt <= this.clock.now()) {
      this.entries.delete(symbol);
      return null;
    }
    return q;
  }
}
