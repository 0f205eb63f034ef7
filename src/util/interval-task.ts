import { createChildLogger } from '../logger.js';

const log = createChildLogger('interval-task');

/**
 * setInterval wrapper that never overlaps runs and never lets a failure
 * escape the timer callback.
 */
export class IntervalTask {
  private timer: NodeJS.Timeout | null = null;
  private inFlight = false;
  private readonly name: string;
  private readonly intervalMs: number;
  private readonly fn: () => Promise<void>;

  constructor(name: string, intervalMs: number, fn: () => Promise<void>) {
    this.name = name;
    this.intervalMs = intervalMs;
    this.fn = fn;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.tick();
    }, this.intervalMs);
    log.info({ task: this.name, intervalMs: this.intervalMs }, 'Interval task started');
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    log.info({ task: this.name }, 'Interval task stopped');
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  /** Runs once now unless a previous run is still in flight. */
  async tick(): Promise<void> {
    if (this.inFlight) {
      log.debug({ task: this.name }, 'Previous run still in flight, skipping');
      return;
    }
    this.inFlight = true;
    try {
      await this.fn();
    } catch (err) {
      log.error({ err, task: this.name }, 'Interval task run failed');
    } finally {
      this.inFlight = false;
    }
  }
}
