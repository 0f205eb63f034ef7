import { createChildLogger } from '../logger.js';
import { errorMessage } from '../errors.js';
import { atTimeOfDay, formatDate } from '../util/time.js';
import { exportDailyResults } from './daily-export.js';
import { formatDailyReport, formatNoTrades } from './formatter.js';
import type { ForexApi } from '../execution/forex-api.js';
import type { TradeLedger } from '../engine/trade-ledger.js';
import type { Notifier } from '../notification/notifier.js';
import type { DailyReport } from '../types/index.js';

const log = createChildLogger('day-finalizer');

export const DAILY_CUTOFF = { hours: 19, minutes: 0, seconds: 0 };

export interface DayFinalizerDeps {
  api: Pick<ForexApi, 'getAssets'>;
  trades: TradeLedger;
  notifier: Notifier;
  resultsDir: string;
}

/**
 * End-of-day aggregation: results that exited before 19:00 on `day` are
 * reported and exported; later ones stay in the ledger for the next day.
 */
export class DayFinalizer {
  private readonly deps: DayFinalizerDeps;

  constructor(deps: DayFinalizerDeps) {
    this.deps = deps;
  }

  async finalize(day: number): Promise<DailyReport> {
    const { trades, notifier } = this.deps;
    const date = formatDate(day);
    const cutoff = atTimeOfDay(day, DAILY_CUTOFF);
    const { results, fees } = trades.drainBefore(cutoff);

    const report: DailyReport = {
      date,
      results,
      totalPips: results.reduce((s, r) => s + r.profitPips, 0),
      totalAmount: results.reduce((s, r) => s + r.profitAmount, 0),
      totalFee: fees,
      balance: null,
    };

    if (results.length === 0) {
      log.info({ date }, 'No trades to finalize');
      notifier.send(formatNoTrades(date));
      return report;
    }

    try {
      report.balance = (await this.deps.api.getAssets()).balance;
    } catch (err) {
      log.error({ err }, 'Balance lookup for day report failed');
    }
    notifier.send(formatDailyReport(report));

    try {
      exportDailyResults(this.deps.resultsDir, date, results);
    } catch (err) {
      log.error({ err, date }, 'Daily export failed');
      notifier.notifyError('day-finalizer', `Export failed: ${errorMessage(err)}`);
    }
    log.info({ date, trades: results.length, pips: report.totalPips }, 'Day finalized');
    return report;
  }
}
