import { createChildLogger } from '../logger.js';
import { unrealizedPips } from '../risk/position-sizer.js';
import { IntervalTask } from '../util/interval-task.js';
import type { ForexApi } from '../execution/forex-api.js';
import type { Notifier } from '../notification/notifier.js';
import type { Clock } from '../util/clock.js';
import type { OrderExecutor } from './order-executor.js';
import type { PositionRegistry, TrackedPosition } from './position-registry.js';
import type { ExitReason, Position } from '../types/index.js';

const log = createChildLogger('position-monitor');

/** Interval during which a plan entry may legitimately hold a position. */
export interface TradeWindow {
  symbol: string;
  start: number;
  end: number;
}

export interface MonitorSettings {
  /** 0 = disabled */
  stopLossPips: number;
  /** 0 = disabled */
  takeProfitPips: number;
  checkIntervalSec: number;
  sweepIntervalMin: number;
  /** slack added on both sides of every window (entry/exit jitter) */
  windowGraceMs: number;
}

export interface PositionMonitorDeps {
  api: ForexApi;
  executor: OrderExecutor;
  registry: PositionRegistry;
  notifier: Notifier;
  clock: Clock;
  /** Current plan windows; re-read on every sweep. */
  windows: () => readonly TradeWindow[];
}

export type ThresholdHit = { positionId: string; reason: 'STOP_LOSS' | 'TAKE_PROFIT'; pips: number };

/**
 * SL/TP poll loop over owned positions plus the slower sweep that closes
 * positions nobody owns.
 *
 * Owned positions are never swept: their scheduled exit takes precedence,
 * and every close goes through the registry's exit claim.
 */
export class PositionMonitor {
  private readonly deps: PositionMonitorDeps;
  private readonly settings: MonitorSettings;
  private readonly checkTask: IntervalTask;
  private readonly sweepTask: IntervalTask;

  constructor(deps: PositionMonitorDeps, settings: MonitorSettings) {
    this.deps = deps;
    this.settings = settings;
    this.checkTask = new IntervalTask('position-check', settings.checkIntervalSec * 1000, async () => {
      await this.checkThresholds();
    });
    this.sweepTask = new IntervalTask('position-sweep', settings.sweepIntervalMin * 60_000, async () => {
      await this.sweep();
    });
  }

  start(): void {
    this.checkTask.start();
    this.sweepTask.start();
  }

  stop(): void {
    this.checkTask.stop();
    this.sweepTask.stop();
  }

  get isRunning(): boolean {
    return this.checkTask.isRunning;
  }

  /** One SL/TP pass. Returns the positions it closed. */
  async checkThresholds(): Promise<ThresholdHit[]> {
    const { stopLossPips, takeProfitPips } = this.settings;
    if (stopLossPips <= 0 && takeProfitPips <= 0) return [];

    const { registry, api, executor, notifier } = this.deps;
    const watched = registry.list().filter((t) => registry.claimedBy(t.position.positionId) === null);
    if (watched.length === 0) return [];

    const symbols = [...new Set(watched.map((t) => t.position.symbol))];
    const quotes = await api.getQuotes(symbols);
    const hits: ThresholdHit[] = [];

    for (const tracked of watched) {
      const { position } = tracked;
      const quote = quotes.get(position.symbol);
      if (!quote) {
        log.warn({ symbol: position.symbol }, 'No quote for monitored position');
        continue;
      }
      const pips = unrealizedPips(position.entryPrice, quote, position.side, position.symbol);
      log.debug({ positionId: position.positionId, pips }, 'Position check');

      let reason: 'STOP_LOSS' | 'TAKE_PROFIT' | null = null;
      if (stopLossPips > 0 && pips <= -stopLossPips) reason = 'STOP_LOSS';
      else if (takeProfitPips > 0 && pips >= takeProfitPips) reason = 'TAKE_PROFIT';
      if (!reason) continue;

      log.info({ positionId: position.positionId, pips, reason }, 'Threshold reached');
      notifier.notifyThreshold(position, pips, reason);
      const outcome = await executor.close(tracked, reason);
      if (outcome.status === 'CLOSED') hits.push({ positionId: position.positionId, reason, pips });
    }
    return hits;
  }

  /** True when `symbol` is inside one of its plan windows (grace included) at `at`. */
  inWindow(symbol: string, at: number): boolean {
    const grace = this.settings.windowGraceMs;
    return this.deps.windows().some((w) => w.symbol === symbol && at >= w.start - grace && at <= w.end + grace);
  }

  /**
   * Closes every exchange position that no path owns and that sits outside
   * all plan windows for its symbol.
   */
  async sweep(): Promise<Position[]> {
    const now = this.deps.clock.now();
    const open = await this.deps.api.getOpenPositions();
    const orphans = open.filter((p) => this.isUnowned(p) && !this.inWindow(p.symbol, now));
    if (orphans.length > 0) log.warn({ count: orphans.length }, 'Positions outside every plan window');
    return this.closeOrphans(orphans, 'SWEEP');
  }

  /**
   * After a failed entry: checks `symbol` every check interval until
   * `until`, closing unowned positions the exchange opened anyway.
   */
  async watch(symbol: string, until: number): Promise<Position[]> {
    const { clock, api } = this.deps;
    const intervalMs = this.settings.checkIntervalSec * 1000;
    const closed: Position[] = [];
    log.info({ symbol, until }, 'Watchdog started');
    while (clock.now() <= until) {
      try {
        const open = await api.getOpenPositions(symbol);
        closed.push(...(await this.closeOrphans(open.filter((p) => this.isUnowned(p)), 'WATCHDOG')));
      } catch (err) {
        log.warn({ err, symbol }, 'Watchdog check failed');
      }
      await clock.sleep(intervalMs);
    }
    log.info({ symbol, closed: closed.length }, 'Watchdog finished');
    return closed;
  }

  private isUnowned(position: Position): boolean {
    const { registry } = this.deps;
    return (
      !registry.has(position.positionId) &&
      registry.claimedBy(position.positionId) === null &&
      !registry.isEntering(position.symbol)
    );
  }

  private async closeOrphans(positions: Position[], reason: ExitReason): Promise<Position[]> {
    const closed: Position[] = [];
    for (const position of positions) {
      this.deps.notifier.notifyOrphan(position, reason);
      const tracked: TrackedPosition = { position, tradeIndex: null, exitAt: null, machine: null };
      const outcome = await this.deps.executor.close(tracked, reason);
      if (outcome.status === 'CLOSED') closed.push(position);
    }
    return closed;
  }
}
