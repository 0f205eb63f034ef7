import { createChildLogger } from '../logger.js';
import { errorMessage } from '../errors.js';
import type { ForexApi } from '../execution/forex-api.js';
import type { OrderExecutor } from '../engine/order-executor.js';
import { escapeHtml, type Notifier } from '../notification/notifier.js';
import type { Clock } from '../util/clock.js';

const log = createChildLogger('kill-switch');

export interface KillResult {
  closed: number;
  failed: number;
  /** open positions left after the attempt; null when the recount failed */
  remaining: number | null;
}

/**
 * Emergency close of every open position. Trading keeps running; each
 * position gets one close attempt and failures are reported.
 */
export class KillSwitch {
  private readonly executor: OrderExecutor;
  private readonly api: Pick<ForexApi, 'getOpenPositions'>;
  private readonly notifier: Notifier;
  private readonly clock: Clock;
  private activatedAt: number | null = null;

  constructor(executor: OrderExecutor, api: Pick<ForexApi, 'getOpenPositions'>, notifier: Notifier, clock: Clock) {
    this.executor = executor;
    this.api = api;
    this.notifier = notifier;
    this.clock = clock;
  }

  async activate(reason: string): Promise<KillResult> {
    this.activatedAt = this.clock.now();
    log.error({ reason }, 'KILL SWITCH ACTIVATED');
    this.notifier.send(`🚨 <b>Closing all positions</b> (${escapeHtml(reason)})`);

    const { closed, failed } = await this.executor.closeAll('SHUTDOWN');

    let remaining: number | null = null;
    try {
      remaining = (await this.api.getOpenPositions()).length;
    } catch (err) {
      log.error({ err }, 'Recount after kill failed');
      this.notifier.notifyError('kill-switch', `Could not recount positions: ${errorMessage(err)}`);
    }

    const summary = `Kill finished: ${closed} closed, ${failed} failed` + (remaining ? `, ${remaining} still open` : '');
    if (failed > 0 || (remaining ?? 0) > 0) log.error({ closed, failed, remaining }, summary);
    else log.warn({ closed }, summary);
    this.notifier.send(remaining === 0 && failed === 0 ? `✅ ${summary}` : `⚠️ ${summary}`);
    return { closed, failed, remaining };
  }

  getActivatedAt(): number | null {
    return this.activatedAt;
  }
}
