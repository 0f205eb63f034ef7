import { describe, it, expect } from 'vitest';
import { existsSync, readFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { DayFinalizer } from '../src/report/day-finalizer.js';
import { exportDailyResults, toCsvRow } from '../src/report/daily-export.js';
import {
  formatDailyReport,
  formatDuration,
  formatHealth,
  formatNoTrades,
} from '../src/report/formatter.js';
import { TradeLedger } from '../src/engine/trade-ledger.js';
import { Notifier } from '../src/notification/notifier.js';
import { FakeClock } from './helpers/fake-clock.js';
import { FakeExchange, RecordingChannel } from './helpers/fake-exchange.js';
import { tradeResult } from './helpers/results.js';

const TMP_DIR = join(import.meta.dirname ?? '.', '__tmp__', 'report');
const local = (h: number, m: number): number => new Date(2026, 2, 2, h, m, 0).getTime();

describe('formatter', () => {
  it('formats a duration as days, hours and minutes', () => {
    expect(formatDuration(((26 * 60) + 5) * 60_000 + 59_999)).toBe('1d 2h 5m');
    expect(formatDuration(0)).toBe('0d 0h 0m');
  });

  it('renders the daily table and totals', () => {
    const text = formatDailyReport({
      date: '2026-03-02',
      results: [tradeResult()],
      totalPips: 50,
      totalAmount: 3166.5,
      totalFee: 12,
      balance: 103_166.5,
    });

    const lines = text.split('\n');
    expect(lines[0]).toBe('📊 <b>2026-03-02 results (exits before 19:00)</b>');
    expect(lines[4]).toBe('USD_JPY  BUY         150      150.5     6333    50.0     3167');
    expect(lines.slice(-4)).toEqual([
      'Total pips: +50.0',
      'Total P&amp;L: +3167 JPY',
      'API fees: 12 JPY',
      'Balance: 103,167 JPY',
    ]);
  });

  it('shows an unavailable balance', () => {
    const text = formatDailyReport({ date: '2026-03-02', results: [], totalPips: -3, totalAmount: -300, totalFee: 0, balance: null });

    expect(text.split('\n').slice(-4)).toEqual([
      'Total pips: -3.0',
      'Total P&amp;L: -300 JPY',
      'API fees: 0 JPY',
      'Balance: unavailable',
    ]);
  });

  it('escapes health check details', () => {
    const text = formatHealth({
      ok: false,
      checkedAt: 0,
      checks: [
        { name: 'api', ok: true, detail: 'balance 100000' },
        { name: 'files', ok: false, detail: 'missing <trades.csv>' },
      ],
    });

    expect(text).toBe('❌ <b>Health check failed</b>\n✅ api: balance 100000\n❌ files: missing &lt;trades.csv&gt;');
  });
});

describe('daily export', () => {
  it('writes one CSV row per result', () => {
    expect(toCsvRow('2026-03-02', tradeResult())).toBe(
      '2026-03-02,USD_JPY,BUY,150,150.5,6333,50.0,3167,2026-03-02T00:00:00.000Z,2026-03-02T00:30:00.000Z',
    );
  });

  it('replaces an earlier export for the same date', () => {
    try {
      exportDailyResults(TMP_DIR, '2026-03-02', [tradeResult(), tradeResult()]);
      const path = exportDailyResults(TMP_DIR, '2026-03-02', [tradeResult({ side: 'SELL' })]);

      expect(path).toBe(join(TMP_DIR, 'daily_results_2026-03-02.csv'));
      expect(readFileSync(path, 'utf-8').split('\n')).toEqual([
        'date,symbol,side,entryPrice,exitPrice,lotSize,profitPips,profitAmount,entryTime,exitTime',
        '2026-03-02,USD_JPY,SELL,150,150.5,6333,50.0,3167,2026-03-02T00:00:00.000Z,2026-03-02T00:30:00.000Z',
        '',
      ]);
    } finally {
      rmSync(TMP_DIR, { recursive: true, force: true });
    }
  });
});

describe('TradeLedger', () => {
  it('drains results before the cutoff and rolls the rest over', () => {
    const ledger = new TradeLedger();
    ledger.record(tradeResult({ exitTime: local(18, 59) }));
    ledger.record(tradeResult({ exitTime: local(19, 0) }));
    ledger.addFee(5);

    const { results, fees } = ledger.drainBefore(local(19, 0));

    expect(results.map((r) => r.exitTime)).toEqual([local(18, 59)]);
    expect(fees).toBe(5);
    expect(ledger.pending().map((r) => r.exitTime)).toEqual([local(19, 0)]);
    expect(ledger.feeTotal).toBe(0);
    expect(ledger.history()).toHaveLength(2);
    expect(ledger.lastExitTime()).toBe(local(19, 0));
  });

  it('carries fees of rolled trades and open positions to the next day', () => {
    const ledger = new TradeLedger();
    ledger.addFee(2, 'P1');
    ledger.addFee(3, 'P2');
    ledger.addFee(4, 'P3');
    ledger.addFee(1);
    ledger.record(tradeResult({ exitTime: local(18, 59) }), 'P1');
    ledger.record(tradeResult({ exitTime: local(19, 30) }), 'P2');

    const today = ledger.drainBefore(local(19, 0));

    expect(today.fees).toBe(3);
    expect(ledger.feeTotal).toBe(7);

    const tomorrow = ledger.drainBefore(local(19, 0) + 24 * 60 * 60_000);

    expect(tomorrow.results.map((r) => r.exitTime)).toEqual([local(19, 30)]);
    expect(tomorrow.fees).toBe(3);
    expect(ledger.feeTotal).toBe(4);
  });
});

describe('DayFinalizer', () => {
  function setup() {
    const exchange = new FakeExchange(new FakeClock(local(19, 0)));
    const channel = new RecordingChannel();
    const trades = new TradeLedger();
    const finalizer = new DayFinalizer({ api: exchange, trades, notifier: new Notifier(channel), resultsDir: TMP_DIR });
    return { exchange, channel, trades, finalizer };
  }

  it('reports and exports trades that exited before 19:00', async () => {
    const { channel, trades, finalizer } = setup();
    trades.record(tradeResult({ exitTime: local(9, 30) }));
    trades.record(tradeResult({ exitTime: local(14, 45), profitPips: -10, profitAmount: -633.3 }));
    trades.record(tradeResult({ exitTime: local(23, 55) }));
    trades.addFee(12);

    try {
      const report = await finalizer.finalize(local(19, 0));

      expect(report).toMatchObject({ date: '2026-03-02', totalPips: 40, totalFee: 12, balance: 100_000 });
      expect(report.totalAmount).toBeCloseTo(2533.2, 6);
      expect(report.results).toHaveLength(2);
      expect(trades.pending()).toHaveLength(1);
      expect(channel.messages[0]?.split('\n')[0]).toBe('📊 <b>2026-03-02 results (exits before 19:00)</b>');
      expect(existsSync(join(TMP_DIR, 'daily_results_2026-03-02.csv'))).toBe(true);
    } finally {
      rmSync(TMP_DIR, { recursive: true, force: true });
    }
  });

  it('sends a short note when nothing closed', async () => {
    const { exchange, channel, finalizer } = setup();

    const report = await finalizer.finalize(local(19, 0));

    expect(report.results).toEqual([]);
    expect(channel.messages).toEqual([formatNoTrades('2026-03-02')]);
    expect(exchange.assetCalls).toBe(0);
    expect(existsSync(join(TMP_DIR, 'daily_results_2026-03-02.csv'))).toBe(false);
  });

  it('still reports when the balance lookup fails', async () => {
    const { exchange, channel, trades, finalizer } = setup();
    exchange.getAssets = async () => {
      throw new Error('timeout');
    };
    trades.record(tradeResult({ exitTime: local(9, 30) }));

    try {
      const report = await finalizer.finalize(local(19, 0));

      expect(report.balance).toBeNull();
      expect(channel.messages[0]?.endsWith('Balance: unavailable')).toBe(true);
    } finally {
      rmSync(TMP_DIR, { recursive: true, force: true });
    }
  });
});
