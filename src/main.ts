import { loadConfig, type AppConfig } from './config.js';
import { createChildLogger } from './logger.js';
import { ConfigError, errorMessage } from './errors.js';
import { SignedApiClient } from './exchange/forex/client.js';
import { ForexRestApi } from './execution/forex-api.js';
import { PositionSizer } from './risk/position-sizer.js';
import { DailyVolumeLedger } from './risk/volume-ledger.js';
import { PositionRegistry } from './engine/position-registry.js';
import { TradeLedger } from './engine/trade-ledger.js';
import { OrderExecutor } from './engine/order-executor.js';
import { PositionMonitor } from './engine/position-monitor.js';
import { TradeScheduler } from './engine/trade-scheduler.js';
import { DayFinalizer } from './report/day-finalizer.js';
import { ensureDir } from './report/daily-export.js';
import { TelegramNotifier } from './notification/telegram.js';
import { Notifier } from './notification/notifier.js';
import { KillSwitch } from './safety/kill-switch.js';
import { HealthChecker } from './supervisor/health.js';
import { RestartGuard } from './supervisor/restart-guard.js';
import { Supervisor } from './supervisor/supervisor.js';
import { startCommandServer } from './api-server.js';
import { systemClock } from './util/clock.js';

const log = createChildLogger('main');

/** Extra slack around plan windows before the sweep treats a position as orphaned. */
const SWEEP_GRACE_EXTRA_MS = 60_000;

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      log.fatal({ issues: err.issues }, 'Invalid configuration');
      console.error(err.message);
      process.exit(1);
    }
    throw err;
  }
}

async function main(): Promise<void> {
  const config = readConfig();
  const clock = systemClock;
  const random = Math.random;
  log.info({ planFile: config.paths.planFile, autoLot: config.trading.autoLot }, 'Starting FX auto trader');

  const client = new SignedApiClient(config.api, { clock, random });
  const api = new ForexRestApi(client, clock);
  const notifier = new Notifier(new TelegramNotifier(config.telegram.botToken, config.telegram.chatId));

  const sizer = new PositionSizer(api, config.trading.riskRatio);
  const volume = new DailyVolumeLedger(config.trading.dailyVolumeLimit);
  const trades = new TradeLedger();
  const registry = new PositionRegistry();

  const executor = new OrderExecutor(
    { api, sizer, volume, trades, registry, notifier, clock },
    {
      spreadThreshold: config.trading.spreadThreshold,
      entryRetryIntervalSec: config.trading.entryRetryIntervalSec,
      maxEntryAttempts: config.trading.maxEntryAttempts,
      exitRetryIntervalSec: config.trading.exitRetryIntervalSec,
      maxExitAttempts: config.trading.maxExitAttempts,
      leverage: config.trading.leverage,
      autoLot: config.trading.autoLot,
    },
  );

  const monitor: PositionMonitor = new PositionMonitor(
    { api, executor, registry, notifier, clock, windows: () => scheduler.windows() },
    {
      stopLossPips: config.monitor.stopLossPips,
      takeProfitPips: config.monitor.takeProfitPips,
      checkIntervalSec: config.monitor.checkIntervalSec,
      sweepIntervalMin: config.monitor.sweepIntervalMin,
      windowGraceMs: config.trading.jitterSeconds * 1000 + SWEEP_GRACE_EXTRA_MS,
    },
  );

  const scheduler = new TradeScheduler(
    { executor, monitor, registry, trades, notifier, clock, random },
    { jitterSeconds: config.trading.jitterSeconds, planFile: config.paths.planFile },
  );

  ensureDir(config.paths.resultsDir);
  const finalizer = new DayFinalizer({ api, trades, notifier, resultsDir: config.paths.resultsDir });
  const health = new HealthChecker({
    api,
    notifier,
    clock,
    requiredFiles: [config.paths.planFile],
    resultsDir: config.paths.resultsDir,
  });
  const guard = new RestartGuard(clock, RestartGuard.stateFromEnv(process.env));
  const killSwitch = new KillSwitch(executor, api, notifier, clock);

  const supervisor = new Supervisor(
    {
      api,
      executor,
      scheduler,
      monitor,
      finalizer,
      volume,
      health,
      guard,
      killSwitch,
      registry,
      trades,
      limiter: client.limiter,
      notifier,
      clock,
    },
    { autoRestartHour: config.supervisor.autoRestartHour, closeAttempts: 1 },
  );

  process.on('unhandledRejection', (reason) => {
    log.error({ err: reason }, 'Unhandled rejection');
    notifier.notifyError('main', `Unhandled rejection: ${errorMessage(reason)}`);
  });
  process.on('uncaughtException', (err) => {
    log.fatal({ err }, 'Uncaught exception');
    notifier.notifyError('main', `Uncaught exception: ${err.message}`);
  });

  const shutdown = (signal: string): void => {
    log.info({ signal }, 'Shutting down');
    supervisor.stop(signal).catch((err: unknown) => {
      log.error({ err }, 'Shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  startCommandServer(supervisor, config.admin);
  supervisor.start();
  await supervisor.done();
}

main().catch((err: unknown) => {
  log.fatal({ err }, 'Fatal error');
  process.exit(1);
});
