import { apiSuccessRate } from './metrics.js';
import { escapeHtml } from '../notification/notifier.js';
import type { DailyReport, HealthReport, PerformanceMetrics, StatusSnapshot } from '../types/index.js';

function signed(value: number, digits: number): string {
  return `${value >= 0 ? '+' : ''}${value.toFixed(digits)}`;
}

function formatJpy(value: number): string {
  return `${Math.round(value).toLocaleString('en-US')} JPY`;
}

export function formatDuration(ms: number): string {
  const totalMin = Math.floor(ms / 60_000);
  const days = Math.floor(totalMin / 1440);
  const hours = Math.floor((totalMin % 1440) / 60);
  return `${days}d ${hours}h ${totalMin % 60}m`;
}

function formatSection(title: string, rows: [string, string][]): string {
  const lines: string[] = [];
  lines.push(`── ${title} ${'─'.repeat(Math.max(2, 30 - title.length))}`);
  for (const [key, value] of rows) {
    lines.push(`  ${key.padEnd(18)} ${value}`);
  }
  return lines.join('\n');
}

/** Day report for the channel: fixed-width table inside <pre>. */
export function formatDailyReport(report: DailyReport): string {
  const lines: string[] = [];
  lines.push(`📊 <b>${report.date} results (exits before 19:00)</b>`);
  lines.push('<pre>');
  lines.push('Symbol   Side Entry      Exit       Lot       Pips    Amount');
  lines.push('──────── ──── ────────── ────────── ──────── ─────── ────────');
  for (const r of report.results) {
    lines.push(
      [
        r.symbol.padEnd(8),
        r.side.padEnd(4),
        String(r.entryPrice).padStart(10),
        String(r.exitPrice).padStart(10),
        String(r.lotSize).padStart(8),
        r.profitPips.toFixed(1).padStart(7),
        r.profitAmount.toFixed(0).padStart(8),
      ].join(' '),
    );
  }
  lines.push('</pre>');
  lines.push(`Total pips: ${signed(report.totalPips, 1)}`);
  lines.push(`Total P&amp;L: ${signed(Math.round(report.totalAmount), 0)} JPY`);
  lines.push(`API fees: ${formatJpy(report.totalFee)}`);
  lines.push(`Balance: ${report.balance === null ? 'unavailable' : formatJpy(report.balance)}`);
  return lines.join('\n');
}

export function formatNoTrades(date: string): string {
  return `📊 ${date}: no trades closed before 19:00.`;
}

export function formatPerformance(metrics: PerformanceMetrics, uptimeMs: number, balance: number | null): string {
  const rate = apiSuccessRate(metrics);
  return [
    '📈 <b>Performance</b>',
    '<pre>',
    formatSection('Trades', [
      ['Uptime', formatDuration(uptimeMs)],
      ['Total', String(metrics.totalTrades)],
      ['Wins / Losses', `${metrics.wins} / ${metrics.losses}`],
      ['Win rate', `${metrics.winRate.toFixed(1)}%`],
    ]),
    formatSection('P&amp;L', [
      ['Total pips', signed(metrics.totalPips, 1)],
      ['Average pips', signed(metrics.averagePips, 1)],
      ['Total amount', `${signed(Math.round(metrics.totalAmount), 0)} JPY`],
      ['Max DD pips', `-${metrics.maxDrawdownPips.toFixed(1)}`],
      ['Max DD amount', `-${Math.round(metrics.maxDrawdownAmount)} JPY`],
      ['Balance', balance === null ? 'unavailable' : formatJpy(balance)],
    ]),
    formatSection('API', [
      ['Calls', String(metrics.apiCalls)],
      ['Errors', String(metrics.apiErrors)],
      ['Success rate', rate === null ? 'N/A' : `${rate.toFixed(1)}%`],
    ]),
    '</pre>',
  ].join('\n');
}

export function formatStatus(status: StatusSnapshot): string {
  const volume = Object.entries(status.volume).map(([symbol, v]): [string, string] => [symbol, String(v)]);
  return [
    'ℹ️ <b>Status</b>',
    '<pre>',
    formatSection('Process', [
      ['Uptime', formatDuration(status.uptimeMs)],
      ['Memory', `${status.rssMb.toFixed(1)} MB`],
      ['Restarts', `${status.restarts}/${status.maxRestarts}`],
    ]),
    formatSection('Trading', [
      ['Open positions', String(status.activePositions)],
      ['Pending results', String(status.pendingResults)],
      ['Fees today', formatJpy(status.feeTotal)],
      ['Rate limit', `${status.rateLimit}/s`],
      ['Throttles', String(status.throttleCount)],
    ]),
    ...(volume.length > 0 ? [formatSection('Volume today', volume)] : []),
    '</pre>',
  ].join('\n');
}

export function formatHealth(report: HealthReport): string {
  const lines = [report.ok ? '✅ <b>Health check passed</b>' : '❌ <b>Health check failed</b>'];
  for (const check of report.checks) {
    lines.push(`${check.ok ? '✅' : '❌'} ${check.name}: ${escapeHtml(check.detail)}`);
  }
  return lines.join('\n');
}
