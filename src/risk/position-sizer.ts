import { createChildLogger } from '../logger.js';
import { InvalidInputError, QuoteUnavailableError } from '../errors.js';
import type { ForexApi } from '../execution/forex-api.js';
import type { Quote, Side } from '../types/index.js';

const log = createChildLogger('position-sizer');

export const SAFETY_MARGIN = 0.95;
export const MIN_VOLUME = 1;
export const MAX_VOLUME = 500_000;
/** Cross pair used to express non-JPY amounts in the account currency. */
export const ACCOUNT_CROSS = 'USD_JPY';

export function isJpyQuoted(symbol: string): boolean {
  return symbol.toUpperCase().endsWith('JPY');
}

export function pipSize(symbol: string): number {
  return isJpyQuoted(symbol) ? 0.01 : 0.0001;
}

function round2(v: number): number {
  return Math.round(v * 100) / 100;
}

/** Price an order of `side` fills at: ask for BUY, bid for SELL. */
export function entryRate(quote: Quote, side: Side): number {
  return side === 'BUY' ? quote.ask : quote.bid;
}

/** Price an open position of `side` would close at: bid for BUY, ask for SELL. */
export function markRate(quote: Quote, side: Side): number {
  return side === 'BUY' ? quote.bid : quote.ask;
}

/** Signed pips, positive when the move favours `side`. */
export function profitPips(entryPrice: number, exitPrice: number, side: Side, symbol: string): number {
  const diff = side === 'BUY' ? exitPrice - entryPrice : entryPrice - exitPrice;
  return round2(diff / pipSize(symbol));
}

export function unrealizedPips(entryPrice: number, quote: Quote, side: Side, symbol: string): number {
  return profitPips(entryPrice, markRate(quote, side), side, symbol);
}

/**
 * Volume sizing from account equity and leverage
 *
 * available = balance × riskRatio × 0.95
 * JPY-quoted:  floor(available × leverage / rate)
 * otherwise:   floor(available / USD_JPY bid × leverage / rate)
 * clamped to [1, 500000]
 */
export class PositionSizer {
  private readonly api: Pick<ForexApi, 'getQuotes'>;
  private readonly riskRatio: number;

  constructor(api: Pick<ForexApi, 'getQuotes'>, riskRatio: number) {
    this.api = api;
    this.riskRatio = riskRatio;
  }

  async size(balance: number, symbol: string, side: Side, leverage: number): Promise<number> {
    if (!Number.isFinite(balance) || balance <= 0) throw new InvalidInputError(`Invalid balance: ${balance}`);
    if (!Number.isFinite(leverage) || leverage <= 0) throw new InvalidInputError(`Invalid leverage: ${leverage}`);
    if (!symbol) throw new InvalidInputError('Symbol is required');
    if (side !== 'BUY' && side !== 'SELL') throw new InvalidInputError(`Invalid side: ${String(side)}`);

    const wanted = isJpyQuoted(symbol) ? [symbol] : [symbol, ACCOUNT_CROSS];
    // sized against the live price, never a cached one
    const quotes = await this.api.getQuotes(wanted, { fresh: true });
    const quote = quotes.get(symbol);
    if (!quote) throw new QuoteUnavailableError(symbol);
    const rate = entryRate(quote, side);
    if (!(rate > 0)) throw new QuoteUnavailableError(symbol);

    const available = balance * this.riskRatio * SAFETY_MARGIN;
    let volume: number;
    if (isJpyQuoted(symbol)) {
      volume = Math.floor((available * leverage) / rate);
    } else {
      const cross = quotes.get(ACCOUNT_CROSS);
      if (cross && cross.bid > 0) {
        volume = Math.floor(((available / cross.bid) * leverage) / rate);
      } else {
        log.warn({ symbol }, 'USD_JPY rate unavailable, sizing in account currency');
        volume = Math.floor((available * leverage) / rate);
      }
    }

    const clamped = Math.min(MAX_VOLUME, Math.max(MIN_VOLUME, volume));
    if (clamped !== volume) log.warn({ symbol, volume, clamped }, 'Volume clamped to allowed range');
    log.info({ balance, symbol, side, leverage, riskRatio: this.riskRatio, rate, volume: clamped }, 'Volume sized');
    return clamped;
  }

  /**
   * Realized P&L in the account currency (JPY), 2 decimals.
   * Non-JPY pairs convert with the USD_JPY bid; unconverted if that is missing.
   */
  async profitAmount(entryPrice: number, exitPrice: number, side: Side, symbol: string, size: number): Promise<number> {
    const diff = side === 'BUY' ? exitPrice - entryPrice : entryPrice - exitPrice;
    let amount = diff * size;
    if (!isJpyQuoted(symbol)) {
      try {
        const cross = (await this.api.getQuotes([ACCOUNT_CROSS])).get(ACCOUNT_CROSS);
        if (cross && cross.bid > 0) amount *= cross.bid;
        else log.warn({ symbol }, 'USD_JPY rate unavailable, profit left unconverted');
      } catch (err) {
        log.error({ err, symbol }, 'USD_JPY lookup failed, profit left unconverted');
      }
    }
    return round2(amount);
  }
}
