import { OrderExecutor, type ExecutionSettings } from '../../src/engine/order-executor.js';
import { PositionRegistry, type TrackedPosition } from '../../src/engine/position-registry.js';
import { TradeLedger } from '../../src/engine/trade-ledger.js';
import { Notifier } from '../../src/notification/notifier.js';
import { PositionSizer } from '../../src/risk/position-sizer.js';
import { DailyVolumeLedger } from '../../src/risk/volume-ledger.js';
import { FakeClock } from './fake-clock.js';
import { FakeExchange, RecordingChannel } from './fake-exchange.js';
import type { ScheduledTrade } from '../../src/types/index.js';

export const DEFAULT_SETTINGS: ExecutionSettings = {
  spreadThreshold: 0.02,
  entryRetryIntervalSec: 5,
  maxEntryAttempts: 3,
  exitRetryIntervalSec: 10,
  maxExitAttempts: 3,
  leverage: 10,
  autoLot: true,
};

export interface EngineOptions {
  start?: number;
  volumeCap?: number;
  settings?: Partial<ExecutionSettings>;
}

export function buildEngine(options: EngineOptions = {}) {
  const clock = new FakeClock(options.start ?? new Date(2026, 2, 2, 9, 0, 0).getTime());
  const exchange = new FakeExchange(clock);
  exchange.setQuote('USD_JPY', 149.99, 150.0);
  const channel = new RecordingChannel();
  const notifier = new Notifier(channel);
  const registry = new PositionRegistry();
  const trades = new TradeLedger();
  const volume = new DailyVolumeLedger(options.volumeCap ?? 15_000_000);
  const sizer = new PositionSizer(exchange, 1);
  const executor = new OrderExecutor(
    { api: exchange, sizer, volume, trades, registry, notifier, clock },
    { ...DEFAULT_SETTINGS, ...options.settings },
  );
  return { clock, exchange, channel, notifier, registry, trades, volume, sizer, executor };
}

export function scheduledTrade(clock: FakeClock, overrides: Partial<ScheduledTrade> = {}): ScheduledTrade {
  return {
    index: 1,
    symbol: 'USD_JPY',
    side: 'BUY',
    entryTime: '09:00:00',
    exitTime: '09:30:00',
    lotSize: null,
    entryAt: clock.now(),
    exitAt: clock.now() + 30 * 60_000,
    ...overrides,
  };
}

export function trackedPosition(registry: PositionRegistry, positionId: string): TrackedPosition {
  const tracked = registry.get(positionId);
  if (!tracked) throw new Error(`position ${positionId} is not tracked`);
  return tracked;
}
