import { describe, it, expect, vi, afterEach } from 'vitest';
import { rmSync } from 'node:fs';
import { join } from 'node:path';
import { Supervisor, type CronJob } from '../src/supervisor/supervisor.js';
import { HealthChecker } from '../src/supervisor/health.js';
import { RestartGuard, type RestartState } from '../src/supervisor/restart-guard.js';
import { PositionMonitor } from '../src/engine/position-monitor.js';
import { TradeScheduler } from '../src/engine/trade-scheduler.js';
import { DayFinalizer } from '../src/report/day-finalizer.js';
import { KillSwitch } from '../src/safety/kill-switch.js';
import { AdaptiveRateLimiter } from '../src/execution/rate-limiter.js';
import { AuthError } from '../src/errors.js';
import type { ParsedPlan } from '../src/plan/plan-loader.js';
import { buildEngine, scheduledTrade } from './helpers/engine.js';

const TMP_DIR = join(import.meta.dirname ?? '.', '__tmp__', 'supervisor');
const MB = 1024 * 1024;

interface Options {
  guardState?: RestartState;
  rssMb?: number;
  autoRestartHour?: number | null;
  /** runs until a fatal error instead of one empty cycle */
  plan?: ParsedPlan;
}

function setup(options: Options = {}) {
  const engine = buildEngine();
  const { clock, exchange, executor, registry, trades, notifier, volume } = engine;
  const monitor = new PositionMonitor(
    { api: exchange, executor, registry, notifier, clock, windows: () => [] },
    { stopLossPips: 0, takeProfitPips: 0, checkIntervalSec: 5, sweepIntervalMin: 10, windowGraceMs: 60_000 },
  );
  const scheduler: TradeScheduler = new TradeScheduler(
    {
      executor,
      monitor,
      registry,
      trades,
      notifier,
      clock,
      random: () => 0,
      // one empty cycle, then the driver ends
      loadPlan: () => {
        if (!options.plan) scheduler.stop();
        return options.plan ?? { entries: [], skipped: [] };
      },
    },
    { jitterSeconds: 0, planFile: 'trades.csv' },
  );
  const health = new HealthChecker({
    api: exchange,
    notifier,
    clock,
    requiredFiles: [],
    resultsDir: TMP_DIR,
    freeDisk: async () => 4096 * MB,
    rssBytes: () => (options.rssMb ?? 50) * MB,
  });
  const jobs: Array<{ expression: string; fn: () => void; job: CronJob }> = [];
  const relaunch = vi.fn();
  const halt = vi.fn();

  const supervisor = new Supervisor(
    {
      api: exchange,
      executor,
      scheduler,
      monitor,
      finalizer: new DayFinalizer({ api: exchange, trades, notifier, resultsDir: TMP_DIR }),
      volume,
      health,
      guard: new RestartGuard(clock, options.guardState),
      killSwitch: new KillSwitch(executor, exchange, notifier, clock),
      registry,
      trades,
      limiter: new AdaptiveRateLimiter({}, clock),
      notifier,
      clock,
      scheduleJob: (expression, fn) => {
        const job = { stop: vi.fn() };
        jobs.push({ expression, fn, job });
        return job;
      },
      relaunch,
      halt,
    },
    { autoRestartHour: options.autoRestartHour === undefined ? 4 : options.autoRestartHour, closeAttempts: 1 },
  );
  return { ...engine, monitor, scheduler, supervisor, jobs, relaunch, halt };
}

const flush = (): Promise<void> => new Promise((r) => setImmediate(r));

describe('Supervisor', () => {
  afterEach(() => {
    rmSync(TMP_DIR, { recursive: true, force: true });
  });

  it('starts the wall-clock jobs and the plan driver', async () => {
    const { supervisor, jobs, monitor, channel, halt } = setup();

    supervisor.start();
    await supervisor.done();

    expect(jobs.map((j) => j.expression)).toEqual(['0 19 * * *', '0 0 * * *', '0 4 * * *']);
    expect(monitor.isRunning).toBe(true);
    expect(channel.messages).toContain('🤖 <b>Trader started</b>');

    await supervisor.stop('test');
    expect(monitor.isRunning).toBe(false);
    expect(jobs.every((j) => vi.mocked(j.job.stop).mock.calls.length === 1)).toBe(true);
    expect(halt).toHaveBeenCalledWith(0);
  });

  it('skips the restart job when no restart hour is set', async () => {
    const { supervisor, jobs } = setup({ autoRestartHour: null });

    supervisor.start();
    await supervisor.stop('test');

    expect(jobs.map((j) => j.expression)).toEqual(['0 19 * * *', '0 0 * * *']);
  });

  it('resets the volume ledger once per calendar day', async () => {
    const { clock, executor, volume, supervisor, jobs, channel } = setup();
    supervisor.start();
    await executor.enter(scheduledTrade(clock));
    const reset = jobs[1];
    if (!reset) throw new Error('volume reset job not registered');

    reset.fn();
    await flush();
    expect(volume.get('USD_JPY')).toBe(6333);

    clock.advance(24 * 60 * 60_000);
    reset.fn();
    await flush();
    reset.fn();
    await flush();

    expect(volume.get('USD_JPY')).toBe(0);
    expect(channel.messages.filter((m) => m === '🔄 Daily per-symbol volume reset')).toHaveLength(1);
    await supervisor.stop('test');
  });

  it('restarts after a failed health check, closing positions first', async () => {
    const { clock, exchange, executor, supervisor, relaunch, halt, channel } = setup({ rssMb: 600 });
    await executor.enter(scheduledTrade(clock));

    const report = await supervisor.runHealthCheck();

    expect(report.ok).toBe(false);
    expect(channel.messages).toContain('🔄 <b>Auto restart</b> 1/5: health check failed: memory');
    expect(exchange.positions).toEqual([]);
    expect(relaunch).toHaveBeenCalledWith({ RESTART_COUNT: '1', LAST_RESTART_AT: String(clock.now()) });
    expect(halt).toHaveBeenCalledWith(0);
  });

  it('halts for manual intervention once the restart budget is spent', async () => {
    const { supervisor, relaunch, halt, channel } = setup({ guardState: { count: 5, lastAt: null } });

    const decision = await supervisor.requestRestart('test');

    expect(decision).toEqual({ status: 'EXHAUSTED', count: 5, max: 5 });
    expect(relaunch).not.toHaveBeenCalled();
    expect(halt).toHaveBeenCalledWith(1);
    expect(channel.messages).toContain(
      '🛑 <b>Halted, manual intervention required</b>\nAuto restart limit (5) reached. Last reason: test',
    );
  });

  it('halts when the exchange rejects the credentials', async () => {
    const { exchange, supervisor, relaunch, halt, channel } = setup({
      plan: {
        entries: [
          { index: 1, symbol: 'USD_JPY', side: 'BUY', entryTime: '09:10:00', exitTime: '09:40:00', lotSize: null },
        ],
        skipped: [],
      },
    });
    exchange.placeErrors.push(new AuthError(401, 'invalid API key'));

    supervisor.start();
    await supervisor.done();

    expect(halt).toHaveBeenCalledWith(1);
    expect(relaunch).not.toHaveBeenCalled();
    expect(supervisor.isStopping).toBe(true);
    expect(channel.messages).toContain(
      '🛑 <b>Halted, manual intervention required</b>\nExchange rejected the API credentials (401): invalid API key',
    );
  });

  it('refuses a restart during the cooldown and keeps running', async () => {
    const { clock, supervisor, relaunch, halt, channel } = setup({
      guardState: { count: 1, lastAt: new Date(2026, 2, 2, 8, 59, 0).getTime() },
    });

    const decision = await supervisor.requestRestart('test');

    expect(decision).toEqual({ status: 'COOLDOWN', remainingMs: 240_000 });
    expect(channel.messages).toContain('⏳ Restart refused, cooldown 240 s remaining (test)');
    expect(relaunch).not.toHaveBeenCalled();
    expect(halt).not.toHaveBeenCalled();
    expect(supervisor.isStopping).toBe(false);
    expect(clock.sleeps).toEqual([]);
  });

  it('stops only once', async () => {
    const { supervisor, halt } = setup();

    await supervisor.stop('SIGTERM');
    await supervisor.stop('SIGINT');

    expect(halt).toHaveBeenCalledTimes(1);
  });

  it('reports a status snapshot', async () => {
    const { clock, executor, supervisor } = setup();
    await executor.enter(scheduledTrade(clock));

    const status = supervisor.status();

    expect(status).toMatchObject({
      uptimeMs: 0,
      activePositions: 1,
      rateLimit: 20,
      throttleCount: 0,
      pendingResults: 0,
      feeTotal: 0,
      restarts: 0,
      maxRestarts: 5,
      volume: { USD_JPY: 6333 },
    });
  });
});
