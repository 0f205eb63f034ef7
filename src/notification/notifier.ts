import { createChildLogger } from '../logger.js';
import { errorMessage } from '../errors.js';
import { formatTime } from '../util/time.js';
import type { MessageChannel } from './telegram.js';
import type { ExitReason, Position, Quote, ScheduledTrade, TradeResult } from '../types/index.js';

const log = createChildLogger('notifier');

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

function signed(v: number, digits: number): string {
  return `${v >= 0 ? '+' : ''}${v.toFixed(digits)}`;
}

const EXIT_LABEL: Record<ExitReason, string> = {
  SCHEDULED: 'scheduled exit',
  STOP_LOSS: 'stop-loss',
  TAKE_PROFIT: 'take-profit',
  SWEEP: 'out-of-window sweep',
  WATCHDOG: 'failed-entry watchdog',
  SHUTDOWN: 'shutdown',
};

/**
 * Notification hub. Formats engine events and hands them to the channel.
 * A null channel turns every call into a log line only.
 */
export class Notifier {
  private readonly channel: MessageChannel | null;

  constructor(channel: MessageChannel | null) {
    this.channel = channel;
    if (!channel) log.debug('Notification channel disabled');
  }

  notifyPlan(trades: readonly ScheduledTrade[], lines: readonly string[]): void {
    const rows = trades.map(
      (t) =>
        `#${t.index} ${t.symbol} ${t.side} lot: ${t.lotSize ?? 'auto'} ` +
        `entry ${formatTime(t.entryAt)} exit ${formatTime(t.exitAt)}`,
    );
    this.send([`🗓 <b>Trade plan</b> (${trades.length})`, ...rows, '', ...lines].join('\n'));
  }

  notifyEntry(trade: ScheduledTrade, position: Position, quote: Quote | null, adopted: boolean): void {
    const lines = [
      `📈 <b>${adopted ? 'Position adopted' : 'Entered'}</b> #${trade.index}`,
      `${position.symbol} ${position.side} size ${position.size}`,
      `Entry price: ${position.entryPrice}`,
    ];
    if (quote) lines.push(`Bid/Ask: ${quote.bid} / ${quote.ask}`);
    lines.push(`Planned exit: ${formatTime(trade.exitAt)}`);
    this.send(lines.join('\n'));
  }

  notifySpreadTooWide(trade: ScheduledTrade, spread: number, threshold: number, attempt: number, max: number): void {
    this.send(
      `↔️ Spread too wide for #${trade.index} ${trade.symbol}: ${spread.toFixed(5)} > ${threshold} ` +
        `(attempt ${attempt}/${max})`,
    );
  }

  notifyEntryAttemptFailed(trade: ScheduledTrade, attempt: number, max: number, err: unknown): void {
    this.send(
      `⚠️ Entry attempt ${attempt}/${max} failed for #${trade.index} ${trade.symbol} ${trade.side}: ` +
        escapeHtml(errorMessage(err)),
    );
  }

  notifyEntrySkipped(trade: ScheduledTrade, reason: string): void {
    this.send(`⏭ <b>Entry skipped</b> #${trade.index} ${trade.symbol} ${trade.side}: ${escapeHtml(reason)}`);
  }

  notifyThreshold(position: Position, pips: number, reason: 'STOP_LOSS' | 'TAKE_PROFIT'): void {
    this.send(`🎯 ${position.symbol} ${position.side} hit ${EXIT_LABEL[reason]}: ${pips.toFixed(1)} pips`);
  }

  notifyExit(result: TradeResult, reason: ExitReason): void {
    const emoji = result.profitAmount >= 0 ? '💰' : '📉';
    this.send(
      `${emoji} <b>Closed</b> (${EXIT_LABEL[reason]})\n` +
        `${result.symbol} ${result.side} size ${result.lotSize}\n` +
        `Entry/Exit: ${result.entryPrice} → ${result.exitPrice}\n` +
        `P&amp;L: ${signed(result.profitPips, 1)} pips, ${signed(result.profitAmount, 0)} JPY`,
    );
  }

  notifyExitAttemptFailed(position: Position, attempt: number, max: number, err: unknown): void {
    this.send(
      `⚠️ Close attempt ${attempt}/${max} failed for ${position.symbol} ${position.side}: ` +
        escapeHtml(errorMessage(err)),
    );
  }

  notifyManualClose(position: Position): void {
    this.send(`⚠️ Manual close executed: ${position.symbol} ${position.side} ${position.positionId}`);
  }

  notifyManualCloseFailed(position: Position, err: unknown): void {
    this.send(
      `🚨 <b>Manual close failed</b>: ${position.symbol} ${position.side} ${position.positionId} - ` +
        escapeHtml(errorMessage(err)),
    );
  }

  notifyOrphan(position: Position, reason: ExitReason): void {
    this.send(
      `⚠️ Unrecognized position (${EXIT_LABEL[reason]}): ${position.symbol} ${position.side} ` +
        `${position.size} @ ${position.entryPrice}`,
    );
  }

  notifyRestart(attempt: number, max: number, reason: string): void {
    this.send(`🔄 <b>Auto restart</b> ${attempt}/${max}: ${escapeHtml(reason)}`);
  }

  notifyFatal(reason: string): void {
    this.send(`🛑 <b>Halted, manual intervention required</b>\n${escapeHtml(reason)}`);
  }

  notifyError(module: string, message: string): void {
    this.send(`⚠️ <b>Error</b> [${module}]\n${escapeHtml(message)}`);
  }

  notifyStartup(): void {
    this.send('🤖 <b>Trader started</b>');
  }

  notifyShutdown(): void {
    this.send('🛑 <b>Trader stopped</b>');
  }

  /** Preformatted text (reports, command replies). */
  send(text: string): void {
    log.info({ text: text.slice(0, 120) }, 'Notification');
    if (!this.channel) return;
    try {
      this.channel.send(text);
    } catch (err) {
      log.warn({ err }, 'Notifier send error');
    }
  }

  async ping(): Promise<boolean> {
    if (!this.channel) return false;
    return this.channel.ping();
  }
}
