import { createChildLogger } from '../logger.js';
import { FatalError, errorMessage } from '../errors.js';
import { loadPlan, type ParsedPlan } from '../plan/plan-loader.js';
import { sleepUntil, uniform, type Clock, type RandomSource } from '../util/clock.js';
import { addDays, atTimeOfDay, formatDateTime, parseTimeOfDay, startOfDay } from '../util/time.js';
import type { Notifier } from '../notification/notifier.js';
import type { OrderExecutor } from './order-executor.js';
import type { PositionMonitor, TradeWindow } from './position-monitor.js';
import type { PositionRegistry } from './position-registry.js';
import type { TradeLedger } from './trade-ledger.js';
import type { ScheduledTrade, TradePlanEntry } from '../types/index.js';

const log = createChildLogger('trade-scheduler');

/** Watchdog keeps looking this long past a failed entry's exit time. */
export const WATCHDOG_GRACE_MS = 10 * 60_000;

export interface SchedulerSettings {
  jitterSeconds: number;
  planFile: string;
}

export interface TradeSchedulerDeps {
  executor: OrderExecutor;
  monitor: PositionMonitor;
  registry: PositionRegistry;
  trades: TradeLedger;
  notifier: Notifier;
  clock: Clock;
  random: RandomSource;
  loadPlan?: (path: string) => ParsedPlan;
}

/**
 * Absolute entry/exit times for the plan, read at `now`.
 *
 * Entry is today, or tomorrow when it is not after `now` or falls before
 * `lastExit` (the previous cycle's last exit). Exit is on the entry's day,
 * or the next day when not after entry.
 */
export function resolveSchedule(
  plan: readonly TradePlanEntry[],
  now: number,
  lastExit: number | null,
): ScheduledTrade[] {
  const resolved: ScheduledTrade[] = [];
  for (const entry of plan) {
    const entryTod = parseTimeOfDay(entry.entryTime);
    const exitTod = parseTimeOfDay(entry.exitTime);
    if (!entryTod || !exitTod) {
      log.warn({ index: entry.index }, 'Unparseable plan times, skipping');
      continue;
    }
    let entryAt = atTimeOfDay(now, entryTod);
    if (entryAt <= now || (lastExit !== null && entryAt < lastExit)) entryAt = addDays(entryAt, 1);
    let exitAt = atTimeOfDay(entryAt, exitTod);
    if (exitAt <= entryAt) exitAt = addDays(exitAt, 1);
    resolved.push({ ...entry, entryAt, exitAt });
  }
  return resolved.sort((a, b) => a.entryAt - b.entryAt || a.index - b.index);
}

/**
 * Drives the plan: one trade at a time, jittered entry, monitor while
 * open, jittered scheduled exit. Failed entries get a watchdog.
 */
export class TradeScheduler {
  private readonly deps: TradeSchedulerDeps;
  private readonly settings: SchedulerSettings;
  private readonly watchdogs = new Set<Promise<void>>();
  private schedule: ScheduledTrade[] = [];
  private lastPlannedExit: number | null = null;
  private stopped = false;

  constructor(deps: TradeSchedulerDeps, settings: SchedulerSettings) {
    this.deps = deps;
    this.settings = settings;
  }

  /** Plan windows of the current cycle, for the sweep. */
  windows(): TradeWindow[] {
    return this.schedule.map((t) => ({ symbol: t.symbol, start: t.entryAt, end: t.exitAt }));
  }

  get activeWatchdogs(): number {
    return this.watchdogs.size;
  }

  /** Loads and resolves the plan. Null when there is nothing to run. */
  plan(now: number): ScheduledTrade[] | null {
    const { notifier } = this.deps;
    let parsed: ParsedPlan;
    try {
      parsed = (this.deps.loadPlan ?? loadPlan)(this.settings.planFile);
    } catch (err) {
      log.error({ err }, 'Plan could not be loaded');
      notifier.notifyError('trade-scheduler', `${errorMessage(err)}. Skipping the day.`);
      return null;
    }
    if (parsed.entries.length === 0) {
      notifier.send('📭 The trade plan has no entries. Skipping the day.');
      return null;
    }

    const ledgerExit = this.deps.trades.lastExitTime();
    const lastExit =
      ledgerExit === null ? this.lastPlannedExit : Math.max(ledgerExit, this.lastPlannedExit ?? ledgerExit);
    const schedule = resolveSchedule(parsed.entries, now, lastExit);
    notifier.notifyPlan(
      schedule,
      parsed.skipped.map((s) => `⚠️ line ${s.line} skipped: ${s.reason}`),
    );
    return schedule;
  }

  /** Runs one cycle of the plan. False when there was nothing to run. */
  async runDay(): Promise<boolean> {
    const schedule = this.plan(this.deps.clock.now());
    if (!schedule) return false;
    this.schedule = schedule;

    for (const trade of schedule) {
      if (this.stopped) break;
      await this.runTrade(trade);
      this.lastPlannedExit = Math.max(this.lastPlannedExit ?? trade.exitAt, trade.exitAt);
    }
    return true;
  }

  async runTrade(trade: ScheduledTrade): Promise<void> {
    const { executor, registry, notifier, clock } = this.deps;

    // an earlier trade's exit ran past this entry
    if (clock.now() > trade.entryAt) {
      log.warn({ trade: trade.index, entryAt: formatDateTime(trade.entryAt) }, 'Entry time passed, skipping');
      notifier.notifyEntrySkipped(trade, `entry time ${formatDateTime(trade.entryAt)} already passed`);
      return;
    }
    await sleepUntil(clock, trade.entryAt - this.jitterMs());
    if (this.stopped) return;

    log.info({ trade: trade.index, symbol: trade.symbol, side: trade.side }, 'Entering');
    const outcome = await executor.enter(trade);
    if (outcome.status === 'FAILED') {
      this.spawnWatchdog(trade);
      return;
    }

    await sleepUntil(clock, trade.exitAt - this.jitterMs());
    const tracked = registry.get(outcome.position.positionId);
    if (!tracked) {
      log.info({ trade: trade.index }, 'Position already closed before scheduled exit');
      return;
    }
    const exit = await executor.close(tracked, 'SCHEDULED');
    if (exit.status === 'FAILED') {
      registry.untrack(outcome.position.positionId);
      notifier.notifyError('trade-scheduler', `Scheduled exit failed for #${trade.index}: ${exit.reason}`);
    } else if (exit.status === 'ALREADY_CLAIMED') {
      log.info({ trade: trade.index, by: exit.by }, 'Exit already in progress on another path');
    }
  }

  /** Day after day until stopped. A FatalError ends the loop. */
  async runForever(): Promise<void> {
    const { clock } = this.deps;
    while (!this.stopped) {
      let ran = false;
      try {
        ran = await this.runDay();
      } catch (err) {
        if (err instanceof FatalError) throw err;
        log.error({ err }, 'Trading cycle failed');
        this.deps.notifier.notifyError('trade-scheduler', errorMessage(err));
      }
      if (!ran && !this.stopped) await sleepUntil(clock, addDays(startOfDay(clock.now()), 1));
    }
  }

  stop(): void {
    this.stopped = true;
  }

  /** Waits for running watchdogs. */
  async drain(): Promise<void> {
    await Promise.allSettled([...this.watchdogs]);
  }

  private spawnWatchdog(trade: ScheduledTrade): void {
    const until = trade.exitAt + WATCHDOG_GRACE_MS;
    const task: Promise<void> = this.deps.monitor
      .watch(trade.symbol, until)
      .then(
        (closed) => {
          if (closed.length > 0) log.warn({ trade: trade.index, closed: closed.length }, 'Watchdog closed positions');
        },
        (err: unknown) => {
          log.error({ err, trade: trade.index }, 'Watchdog failed');
        },
      )
      .finally(() => {
        this.watchdogs.delete(task);
      });
    this.watchdogs.add(task);
  }

  private jitterMs(): number {
    return uniform(this.deps.random, this.settings.jitterSeconds * 1000);
  }
}
