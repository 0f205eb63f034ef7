import { spawn } from 'node:child_process';
import cron from 'node-cron';
import { createChildLogger } from '../logger.js';
import { FatalError, errorMessage } from '../errors.js';
import { collectMetrics } from '../report/metrics.js';
import { formatHealth, formatPerformance } from '../report/formatter.js';
import { IntervalTask } from '../util/interval-task.js';
import { formatDate } from '../util/time.js';
import { rssMb, type HealthChecker } from './health.js';
import type { RestartDecision, RestartGuard } from './restart-guard.js';
import type { ForexApi } from '../execution/forex-api.js';
import type { RateLimitSnapshot } from '../execution/rate-limiter.js';
import type { OrderExecutor } from '../engine/order-executor.js';
import type { PositionMonitor } from '../engine/position-monitor.js';
import type { PositionRegistry } from '../engine/position-registry.js';
import type { TradeLedger } from '../engine/trade-ledger.js';
import type { TradeScheduler } from '../engine/trade-scheduler.js';
import type { DayFinalizer } from '../report/day-finalizer.js';
import type { DailyVolumeLedger } from '../risk/volume-ledger.js';
import type { KillSwitch, KillResult } from '../safety/kill-switch.js';
import type { Notifier } from '../notification/notifier.js';
import type { Clock } from '../util/clock.js';
import type { HealthReport, Position, StatusSnapshot } from '../types/index.js';

const log = createChildLogger('supervisor');

export const HEALTH_INTERVAL_MS = 6 * 60 * 60_000;
export const FINALIZE_CRON = '0 19 * * *';
export const VOLUME_RESET_CRON = '0 0 * * *';

export interface CronJob {
  stop(): void;
}

export type ScheduleJob = (expression: string, fn: () => void) => CronJob;

export interface SupervisorDeps {
  api: ForexApi;
  executor: OrderExecutor;
  scheduler: TradeScheduler;
  monitor: PositionMonitor;
  finalizer: DayFinalizer;
  volume: DailyVolumeLedger;
  health: HealthChecker;
  guard: RestartGuard;
  killSwitch: KillSwitch;
  registry: PositionRegistry;
  trades: TradeLedger;
  limiter: { snapshot(): RateLimitSnapshot };
  notifier: Notifier;
  clock: Clock;
  scheduleJob?: ScheduleJob;
  /** Starts a fresh copy of this process with `env` merged in. */
  relaunch?: (env: Record<string, string>) => void;
  halt?: (code: number) => void;
}

export interface SupervisorSettings {
  /** null = no daily restart */
  autoRestartHour: number | null;
  /** close attempts per position on stop/restart */
  closeAttempts: number;
  healthIntervalMs?: number;
}

const cronJob: ScheduleJob = (expression, fn) => cron.schedule(expression, fn);

/** Same argv and execArgv, detached; this process exits right after. */
export function relaunchProcess(env: Record<string, string>): void {
  const child = spawn(process.execPath, [...process.execArgv, ...process.argv.slice(1)], {
    env: { ...process.env, ...env },
    stdio: 'inherit',
    detached: true,
  });
  child.unref();
}

/**
 * Process lifecycle: the wall-clock jobs (finalize, volume reset, daily
 * restart), the health loop, the plan driver and the shutdown paths.
 */
export class Supervisor {
  private readonly deps: SupervisorDeps;
  private readonly settings: SupervisorSettings;
  private readonly healthTask: IntervalTask;
  private readonly jobs: CronJob[] = [];
  private readonly startedAt: number;
  private driver: Promise<void> | null = null;
  private stopping = false;

  constructor(deps: SupervisorDeps, settings: SupervisorSettings) {
    this.deps = deps;
    this.settings = settings;
    this.startedAt = deps.clock.now();
    this.healthTask = new IntervalTask('health-check', settings.healthIntervalMs ?? HEALTH_INTERVAL_MS, async () => {
      await this.runHealthCheck();
    });
  }

  get isStopping(): boolean {
    return this.stopping;
  }

  start(): void {
    const { clock, volume, finalizer, monitor, scheduler, notifier } = this.deps;
    const schedule = this.deps.scheduleJob ?? cronJob;

    volume.resetForDay(formatDate(clock.now()));
    this.jobs.push(
      schedule(FINALIZE_CRON, () => this.runJob('finalize', () => finalizer.finalize(clock.now()))),
      schedule(VOLUME_RESET_CRON, () =>
        this.runJob('volume-reset', async () => {
          if (volume.resetForDay(formatDate(clock.now()))) notifier.send('🔄 Daily per-symbol volume reset');
        }),
      ),
    );
    const hour = this.settings.autoRestartHour;
    if (hour !== null) {
      this.jobs.push(
        schedule(`0 ${hour} * * *`, () =>
          this.runJob('daily-restart', async () => {
            notifier.send(`🔄 Daily restart time (${hour}:00) reached`);
            await this.requestRestart('scheduled daily restart');
          }),
        ),
      );
    }

    this.healthTask.start();
    monitor.start();
    this.driver = scheduler.runForever().catch(async (err: unknown) => {
      if (err instanceof FatalError) {
        log.fatal({ err }, 'Fatal error in plan driver, halting');
        notifier.notifyFatal(err.message);
        await this.shutdown(1);
        return;
      }
      log.error({ err }, 'Plan driver stopped unexpectedly');
      notifier.notifyError('supervisor', `Plan driver stopped: ${errorMessage(err)}`);
    });
    notifier.notifyStartup();
    log.info({ autoRestartHour: hour }, 'Supervisor started');
  }

  private runJob(name: string, fn: () => Promise<unknown>): void {
    Promise.resolve()
      .then(fn)
      .catch((err: unknown) => {
        log.error({ err, job: name }, 'Scheduled job failed');
        this.deps.notifier.notifyError('supervisor', `${name} failed: ${errorMessage(err)}`);
      });
  }

  async runHealthCheck(): Promise<HealthReport> {
    const report = await this.deps.health.run();
    if (!report.ok) {
      this.deps.notifier.send(formatHealth(report));
      const failed = report.checks.filter((c) => !c.ok).map((c) => c.name);
      await this.requestRestart(`health check failed: ${failed.join(', ')}`);
    }
    return report;
  }

  /**
   * Closes positions and re-execs when the guard allows it. A spent budget
   * halts the process for manual intervention.
   */
  async requestRestart(reason: string): Promise<RestartDecision> {
    const { guard, notifier, executor } = this.deps;
    const decision = guard.request();

    if (decision.status === 'EXHAUSTED') {
      log.fatal({ reason, count: decision.count }, 'Restart budget exhausted, halting');
      notifier.notifyFatal(`Auto restart limit (${decision.max}) reached. Last reason: ${reason}`);
      await this.shutdown(1);
      return decision;
    }
    if (decision.status === 'COOLDOWN') {
      notifier.send(`⏳ Restart refused, cooldown ${Math.ceil(decision.remainingMs / 1000)} s remaining (${reason})`);
      return decision;
    }

    notifier.notifyRestart(decision.attempt, decision.max, reason);
    this.stopLoops();
    await executor.closeAll('SHUTDOWN', this.settings.closeAttempts);
    (this.deps.relaunch ?? relaunchProcess)(guard.toEnv());
    this.exit(0);
    return decision;
  }

  kill(reason: string): Promise<KillResult> {
    return this.deps.killSwitch.activate(reason);
  }

  /** Full stop: best-effort close of every position, then halt. */
  async stop(reason: string): Promise<void> {
    log.warn({ reason }, 'Stop requested');
    await this.shutdown(0);
  }

  private async shutdown(code: number): Promise<void> {
    if (this.stopping) return;
    this.stopping = true;
    this.stopLoops();
    const { closed, failed } = await this.deps.executor.closeAll('SHUTDOWN', this.settings.closeAttempts);
    if (failed > 0) this.deps.notifier.send(`⚠️ ${failed} position(s) could not be closed before halting`);
    log.info({ closed, failed }, 'Positions closed for shutdown');
    this.deps.notifier.notifyShutdown();
    this.exit(code);
  }

  private stopLoops(): void {
    this.deps.scheduler.stop();
    this.deps.monitor.stop();
    this.healthTask.stop();
    for (const job of this.jobs.splice(0)) job.stop();
  }

  private exit(code: number): void {
    this.stopping = true;
    (this.deps.halt ?? ((c: number) => process.exit(c)))(code);
  }

  status(): StatusSnapshot {
    const { clock, registry, limiter, trades, guard, volume } = this.deps;
    const rate = limiter.snapshot();
    return {
      uptimeMs: clock.now() - this.startedAt,
      rssMb: rssMb(),
      activePositions: registry.size,
      rateLimit: rate.currentLimit,
      throttleCount: rate.totalThrottles,
      pendingResults: trades.pending().length,
      feeTotal: trades.feeTotal,
      restarts: guard.count,
      maxRestarts: guard.limit,
      volume: volume.snapshot(),
    };
  }

  async performance(): Promise<string> {
    const { api, trades, clock } = this.deps;
    const metrics = collectMetrics(trades.history(), api.stats());
    let balance: number | null = null;
    try {
      balance = (await api.getAssets()).balance;
    } catch (err) {
      log.error({ err }, 'Balance lookup for performance report failed');
    }
    return formatPerformance(metrics, clock.now() - this.startedAt, balance);
  }

  openPositions(): Promise<Position[]> {
    return this.deps.api.getOpenPositions();
  }

  /** Resolves when the plan driver loop ends. */
  async done(): Promise<void> {
    await this.driver;
  }
}
