import { createChildLogger } from '../logger.js';

const log = createChildLogger('telegram');

/** Outbound text channel the Notifier writes to. */
export interface MessageChannel {
  send(text: string): void;
  /** true when the channel's backend answers */
  ping(): Promise<boolean>;
}

/**
 * Telegram Bot API sender
 * - queued, at most one message per second
 * - failures are logged only; a dead chat must not stop trading
 */
export class TelegramNotifier implements MessageChannel {
  private readonly botToken: string;
  private readonly chatId: string;
  private readonly queue: string[] = [];
  private processing = false;

  constructor(botToken: string, chatId: string) {
    this.botToken = botToken;
    this.chatId = chatId;
  }

  send(text: string): void {
    this.queue.push(text);
    if (!this.processing) {
      void this.processQueue();
    }
  }

  async ping(): Promise<boolean> {
    try {
      const res = await fetch(`https://api.telegram.org/bot${this.botToken}/getMe`);
      return res.ok;
    } catch (err) {
      log.warn({ err }, 'Telegram ping failed');
      return false;
    }
  }

  /** Resolves once every queued message has been attempted. */
  async drain(): Promise<void> {
    while (this.processing || this.queue.length > 0) {
      await new Promise((r) => setTimeout(r, 50));
    }
  }

  private async processQueue(): Promise<void> {
    this.processing = true;
    for (let msg = this.queue.shift(); msg !== undefined; msg = this.queue.shift()) {
      try {
        await this.doSend(msg);
      } catch (err) {
        log.warn({ err }, 'Telegram send failed');
      }
      // 1 msg/s
      if (this.queue.length > 0) {
        await new Promise((r) => setTimeout(r, 1000));
      }
    }
    this.processing = false;
  }

  private async doSend(text: string): Promise<void> {
    const url = `https://api.telegram.org/bot${this.botToken}/sendMessage`;
    const res = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ chat_id: this.chatId, text, parse_mode: 'HTML' }),
    });
    if (!res.ok) {
      const body = await res.text().catch(() => '');
      log.warn({ status: res.status, body }, 'Telegram API error');
    }
  }
}
