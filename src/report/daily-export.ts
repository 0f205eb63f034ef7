import { existsSync, mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { createChildLogger } from '../logger.js';
import type { TradeResult } from '../types/index.js';

const log = createChildLogger('daily-export');

export const EXPORT_HEADER = [
  'date',
  'symbol',
  'side',
  'entryPrice',
  'exitPrice',
  'lotSize',
  'profitPips',
  'profitAmount',
  'entryTime',
  'exitTime',
] as const;

export function exportFileName(date: string): string {
  return `daily_results_${date}.csv`;
}

export function toCsvRow(date: string, r: TradeResult): string {
  return [
    date,
    r.symbol,
    r.side,
    String(r.entryPrice),
    String(r.exitPrice),
    String(r.lotSize),
    r.profitPips.toFixed(1),
    r.profitAmount.toFixed(0),
    new Date(r.entryTime).toISOString(),
    new Date(r.exitTime).toISOString(),
  ].join(',');
}

export function ensureDir(dir: string): void {
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
    log.info({ dir }, 'Directory created');
  }
}

/** Writes the day's results to `<dir>/daily_results_<date>.csv`, replacing any earlier file. */
export function exportDailyResults(dir: string, date: string, results: readonly TradeResult[]): string {
  ensureDir(dir);
  const filePath = join(dir, exportFileName(date));
  const lines = [EXPORT_HEADER.join(','), ...results.map((r) => toCsvRow(date, r))];
  writeFileSync(filePath, lines.join('\n') + '\n', 'utf-8');
  log.info({ filePath, rows: results.length }, 'Daily results exported');
  return filePath;
}
