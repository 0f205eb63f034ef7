import { createChildLogger } from '../logger.js';
import {
  AuthError,
  FatalError,
  InvalidInputError,
  QuoteUnavailableError,
  VolumeCapExceededError,
  errorMessage,
  isRetryable,
} from '../errors.js';
import { closingSide, type ForexApi } from '../execution/forex-api.js';
import { markRate, profitPips, type PositionSizer } from '../risk/position-sizer.js';
import { OrderStateMachine } from '../risk/state-machine.js';
import type { DailyVolumeLedger } from '../risk/volume-ledger.js';
import { RetryPolicy } from '../util/retry.js';
import type { Clock } from '../util/clock.js';
import type { Notifier } from '../notification/notifier.js';
import type { PositionRegistry, TrackedPosition } from './position-registry.js';
import type { TradeLedger } from './trade-ledger.js';
import type { ExitReason, OrderReceipt, Position, Quote, ScheduledTrade, TradeResult } from '../types/index.js';

const log = createChildLogger('order-executor');

/** Leverage used to size an empty lot when automatic lots are off. */
export const FIXED_LOT_FALLBACK_LEVERAGE = 18;

export interface ExecutionSettings {
  spreadThreshold: number;
  entryRetryIntervalSec: number;
  maxEntryAttempts: number;
  exitRetryIntervalSec: number;
  maxExitAttempts: number;
  leverage: number;
  autoLot: boolean;
}

export interface OrderExecutorDeps {
  api: ForexApi;
  sizer: PositionSizer;
  volume: DailyVolumeLedger;
  trades: TradeLedger;
  registry: PositionRegistry;
  notifier: Notifier;
  clock: Clock;
}

export type EntryOutcome =
  | { status: 'OPENED'; position: Position; adopted: boolean }
  | { status: 'FAILED'; reason: string; orderPlaced: boolean };

export type ExitOutcome =
  | { status: 'CLOSED'; result: TradeResult }
  | { status: 'ALREADY_CLAIMED'; by: ExitReason | null }
  | { status: 'FAILED'; reason: string };

/** Errors after which another entry attempt cannot help. */
function isFinalEntryError(err: unknown): boolean {
  return err instanceof VolumeCapExceededError || err instanceof InvalidInputError;
}

/**
 * Entry and exit orders for plan entries.
 *
 * Entry: spread check → size → volume booking → market order → position
 * lookup, retried up to `maxEntryAttempts`. Once an order is accepted it is
 * never re-placed for the same plan entry. Rejected credentials end the
 * entry with a FatalError.
 *
 * Exit: exclusive claim → close order retried up to `maxExitAttempts` →
 * one manual close → result recorded.
 */
export class OrderExecutor {
  private readonly deps: OrderExecutorDeps;
  private readonly settings: ExecutionSettings;
  private readonly executionLookup: RetryPolicy;
  private readonly positionLookup: RetryPolicy;

  constructor(deps: OrderExecutorDeps, settings: ExecutionSettings) {
    this.deps = deps;
    this.settings = settings;
    const onRetry = (err: unknown, attempt: number) => log.warn({ err, attempt }, 'Lookup failed, retrying');
    this.executionLookup = new RetryPolicy(
      { attempts: 3, delayMs: 1000, shouldRetry: isRetryable, onRetry },
      deps.clock,
    );
    this.positionLookup = new RetryPolicy(
      { attempts: 5, delayMs: 3000, shouldRetry: isRetryable, onRetry },
      deps.clock,
    );
  }

  async enter(trade: ScheduledTrade): Promise<EntryOutcome> {
    const machine = new OrderStateMachine(`#${trade.index} ${trade.symbol} ${trade.side}`);
    machine.transition('SPREAD_CHECK');
    this.deps.registry.beginEntry(trade.symbol);
    try {
      return await this.runEntry(trade, machine);
    } finally {
      this.deps.registry.endEntry(trade.symbol);
    }
  }

  private async runEntry(trade: ScheduledTrade, machine: OrderStateMachine): Promise<EntryOutcome> {
    const { api, notifier, clock } = this.deps;
    const max = this.settings.maxEntryAttempts;
    const retryMs = this.settings.entryRetryIntervalSec * 1000;
    // a placement failed in a way that may still have reached the exchange
    let ambiguous = false;

    for (let attempt = 1; attempt <= max; attempt++) {
      machine.transition('SPREAD_CHECK');
      if (ambiguous) {
        const adopted = await this.adoptUnowned(trade, machine);
        if (adopted) return adopted;
        ambiguous = false;
      }

      try {
        const quote = (await api.getQuotes([trade.symbol], { fresh: true })).get(trade.symbol);
        if (!quote) throw new QuoteUnavailableError(trade.symbol);
        const spread = quote.ask - quote.bid;
        if (spread > this.settings.spreadThreshold) {
          log.warn({ trade: trade.index, spread, attempt }, 'Spread above threshold');
          notifier.notifySpreadTooWide(trade, spread, this.settings.spreadThreshold, attempt, max);
          if (attempt < max) await clock.sleep(retryMs);
          continue;
        }

        machine.transition('PLACING');
        const size = await this.resolveSize(trade);
        const booking = this.deps.volume.reserve(trade.symbol, size);
        let receipt: OrderReceipt;
        try {
          receipt = await api.placeMarketOrder(trade.symbol, trade.side, size);
        } catch (err) {
          booking.release();
          ambiguous = isRetryable(err);
          throw err;
        }

        machine.transition('RESOLVING');
        const position = await this.resolvePosition(trade, receipt.orderId);
        if (!position) {
          machine.transition('FAILED');
          const reason = `order ${receipt.orderId} accepted but its position could not be resolved`;
          notifier.notifyEntrySkipped(trade, reason);
          return { status: 'FAILED', reason, orderPlaced: true };
        }
        this.track(trade, position, machine);
        notifier.notifyEntry(trade, position, quote, false);
        return { status: 'OPENED', position, adopted: false };
      } catch (err) {
        log.error({ err, trade: trade.index, attempt }, 'Entry attempt failed');
        notifier.notifyEntryAttemptFailed(trade, attempt, max, err);
        if (err instanceof AuthError) {
          machine.transition('FAILED');
          throw new FatalError(`Exchange rejected the API credentials (${err.statusCode}): ${err.message}`, {
            cause: err,
          });
        }
        if (isFinalEntryError(err)) {
          machine.transition('FAILED');
          notifier.notifyEntrySkipped(trade, errorMessage(err));
          return { status: 'FAILED', reason: errorMessage(err), orderPlaced: false };
        }
        if (attempt < max) await clock.sleep(retryMs);
      }
    }

    // only a placement that may have reached the exchange can have left a position behind
    if (ambiguous) {
      log.warn({ trade: trade.index }, 'All entry attempts failed, final position check');
      machine.transition('RESOLVING');
      const adopted = await this.adoptUnowned(trade, machine);
      if (adopted) return adopted;
    }

    machine.transition('FAILED');
    const reason = `no entry after ${max} attempts`;
    notifier.notifyEntrySkipped(trade, reason);
    return { status: 'FAILED', reason, orderPlaced: false };
  }

  private async resolveSize(trade: ScheduledTrade): Promise<number> {
    if (trade.lotSize !== null) return trade.lotSize;
    this.deps.volume.assertRoom(trade.symbol);
    const leverage = this.settings.autoLot ? this.settings.leverage : FIXED_LOT_FALLBACK_LEVERAGE;
    const assets = await this.deps.api.getAssets();
    return this.deps.sizer.size(assets.availableAmount, trade.symbol, trade.side, leverage);
  }

  /**
   * Fills for the order (3 tries), then the open position carrying the
   * fill's positionId (5 tries). Null when either lookup comes up empty.
   */
  private async resolvePosition(trade: ScheduledTrade, orderId: string): Promise<Position | null> {
    try {
      const fills = await this.executionLookup.poll(async () => {
        const list = await this.deps.api.getExecutions(orderId);
        return list.length > 0 ? list : null;
      });
      if (!fills) {
        log.error({ orderId, trade: trade.index }, 'No executions found for order');
        return null;
      }
      const positionId = fills[0]?.positionId;
      this.deps.trades.addFee(fills.reduce((s, f) => s + f.fee, 0), positionId);
      if (!positionId) return null;
      const position = await this.positionLookup.poll(async () => {
        const open = await this.deps.api.getOpenPositions(trade.symbol);
        return open.find((p) => p.positionId === positionId) ?? null;
      });
      if (!position) log.error({ orderId, positionId }, 'Position not listed after retries');
      return position;
    } catch (err) {
      log.error({ err, orderId }, 'Position lookup failed');
      return null;
    }
  }

  /** Picks up an untracked open position matching the trade (order went through despite errors). */
  private async adoptUnowned(trade: ScheduledTrade, machine: OrderStateMachine): Promise<EntryOutcome | null> {
    const { registry, notifier } = this.deps;
    let open: Position[];
    try {
      open = await this.deps.api.getOpenPositions(trade.symbol);
    } catch (err) {
      log.error({ err, symbol: trade.symbol }, 'Open position check failed');
      return null;
    }
    const found = open.find(
      (p) => p.side === trade.side && !registry.has(p.positionId) && registry.claimedBy(p.positionId) === null,
    );
    if (!found) return null;

    log.warn({ trade: trade.index, positionId: found.positionId }, 'Position found despite reported errors');
    try {
      // booking was released when the placement errored
      this.deps.volume.reserve(found.symbol, found.size);
    } catch (err) {
      log.warn({ err, positionId: found.positionId }, 'Adopted position exceeds the daily volume cap');
    }
    machine.transition('RESOLVING');
    this.track(trade, found, machine);
    notifier.notifyEntry(trade, found, null, true);
    return { status: 'OPENED', position: found, adopted: true };
  }

  private track(trade: ScheduledTrade, position: Position, machine: OrderStateMachine): void {
    this.deps.registry.track({ position, tradeIndex: trade.index, exitAt: trade.exitAt, machine });
    machine.transition('MONITORING');
  }

  /**
   * Closes a tracked position under an exclusive claim. A path that finds
   * the claim taken backs off and reports ALREADY_CLAIMED.
   */
  async close(
    tracked: TrackedPosition,
    reason: ExitReason,
    options: { attempts?: number; manualFallback?: boolean } = {},
  ): Promise<ExitOutcome> {
    const { registry, notifier } = this.deps;
    const { position } = tracked;
    if (!registry.claimExit(position.positionId, reason)) {
      return { status: 'ALREADY_CLAIMED', by: registry.claimedBy(position.positionId) };
    }
    tracked.machine?.transition('CLOSING');

    const receipt = await this.submitClose(position, options.attempts ?? this.settings.maxExitAttempts);
    let closed = receipt !== null;
    if (!closed && (options.manualFallback ?? true)) {
      notifier.send(`⚠️ Close attempts exhausted: ${position.symbol} ${position.side}, trying manual close`);
      closed = await this.manualClose(position);
    }
    if (!closed) {
      tracked.machine?.transition('FAILED');
      registry.releaseExit(position.positionId);
      return { status: 'FAILED', reason: `could not close ${position.positionId}` };
    }

    const result = await this.buildResult(position, receipt);
    this.deps.trades.record(result, position.positionId);
    registry.complete(position.positionId);
    tracked.machine?.transition('CLOSED');
    notifier.notifyExit(result, reason);
    return { status: 'CLOSED', result };
  }

  /**
   * Closes every open position at the exchange. Used by kill, stop and
   * restart; failures are reported, not retried further.
   */
  async closeAll(reason: ExitReason, attempts = 1): Promise<{ closed: number; failed: number }> {
    let open: Position[];
    try {
      open = await this.deps.api.getOpenPositions();
    } catch (err) {
      log.error({ err }, 'Could not list open positions');
      this.deps.notifier.notifyError('order-executor', `close-all could not list positions: ${errorMessage(err)}`);
      return { closed: 0, failed: 1 };
    }
    let closed = 0;
    let failed = 0;
    for (const position of open) {
      const tracked = this.deps.registry.get(position.positionId) ?? {
        position,
        tradeIndex: null,
        exitAt: null,
        machine: null,
      };
      const outcome = await this.close(tracked, reason, { attempts, manualFallback: false });
      if (outcome.status === 'CLOSED') closed++;
      else if (outcome.status === 'FAILED') failed++;
    }
    log.info({ reason, closed, failed }, 'Close-all finished');
    return { closed, failed };
  }

  private async submitClose(position: Position, attempts: number): Promise<OrderReceipt | null> {
    const { api, notifier, clock } = this.deps;
    const side = closingSide(position.side);
    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        return await api.closePosition(position.symbol, side, position.positionId, position.size);
      } catch (err) {
        log.error({ err, positionId: position.positionId, attempt }, 'Close attempt failed');
        notifier.notifyExitAttemptFailed(position, attempt, attempts, err);
        if (attempt < attempts) await clock.sleep(this.settings.exitRetryIntervalSec * 1000);
      }
    }
    return null;
  }

  private async manualClose(position: Position): Promise<boolean> {
    try {
      await this.deps.api.closePosition(position.symbol, closingSide(position.side), position.positionId, position.size);
      this.deps.notifier.notifyManualClose(position);
      return true;
    } catch (err) {
      log.error({ err, positionId: position.positionId }, 'Manual close failed');
      this.deps.notifier.notifyManualCloseFailed(position, err);
      return false;
    }
  }

  private async buildResult(position: Position, receipt: OrderReceipt | null): Promise<TradeResult> {
    const exitPrice = await this.exitPrice(position, receipt);
    const { sizer, clock } = this.deps;
    return {
      symbol: position.symbol,
      side: position.side,
      entryPrice: position.entryPrice,
      exitPrice,
      profitPips: profitPips(position.entryPrice, exitPrice, position.side, position.symbol),
      profitAmount: await sizer.profitAmount(position.entryPrice, exitPrice, position.side, position.symbol, position.size),
      lotSize: position.size,
      entryTime: position.openTime,
      exitTime: clock.now(),
    };
  }

  /**
   * Average fill price of the close order; the current mark when fills are
   * unavailable, the entry price as a last resort.
   */
  private async exitPrice(position: Position, receipt: OrderReceipt | null): Promise<number> {
    if (receipt) {
      try {
        const fills = await this.executionLookup.poll(async () => {
          const list = await this.deps.api.getExecutions(receipt.orderId);
          return list.length > 0 ? list : null;
        });
        if (fills) {
          this.deps.trades.addFee(fills.reduce((s, f) => s + f.fee, 0), position.positionId);
          return fills.reduce((s, f) => s + f.price, 0) / fills.length;
        }
      } catch (err) {
        log.error({ err, orderId: receipt.orderId }, 'Close fills lookup failed');
      }
    }
    let quote: Quote | undefined;
    try {
      quote = (await this.deps.api.getQuotes([position.symbol])).get(position.symbol);
    } catch (err) {
      log.error({ err, symbol: position.symbol }, 'Quote lookup for exit price failed');
    }
    if (quote) {
      log.warn({ positionId: position.positionId }, 'Exit price taken from current quote');
      return markRate(quote, position.side);
    }
    log.warn({ positionId: position.positionId }, 'Exit price unknown, recording at entry price');
    return position.entryPrice;
  }
}
