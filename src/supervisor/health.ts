import { existsSync } from 'node:fs';
import { statfs } from 'node:fs/promises';
import { createChildLogger } from '../logger.js';
import { errorMessage } from '../errors.js';
import { ensureDir } from '../report/daily-export.js';
import type { ForexApi } from '../execution/forex-api.js';
import type { Notifier } from '../notification/notifier.js';
import type { Clock } from '../util/clock.js';
import type { HealthCheckResult, HealthReport } from '../types/index.js';

const log = createChildLogger('health');

const MB = 1024 * 1024;
export const MIN_FREE_DISK_BYTES = 1024 * MB;
export const MAX_RSS_MB = 500;
export const WARN_RSS_MB = 100;

export interface HealthCheckerDeps {
  api: Pick<ForexApi, 'getAssets'>;
  notifier: Pick<Notifier, 'ping'>;
  clock: Clock;
  requiredFiles: readonly string[];
  resultsDir: string;
  diskPath?: string;
  /** free bytes on the volume holding `path` */
  freeDisk?: (path: string) => Promise<number>;
  rssBytes?: () => number;
}

async function statfsFree(path: string): Promise<number> {
  const s = await statfs(path);
  return s.bavail * s.bsize;
}

export function rssMb(rssBytes: () => number = () => process.memoryUsage().rss): number {
  return rssBytes() / MB;
}

/**
 * API, channel, disk, memory and required files. Each check is isolated:
 * one throwing marks only that check failed.
 */
export class HealthChecker {
  private readonly deps: HealthCheckerDeps;
  private last: HealthReport | null = null;

  constructor(deps: HealthCheckerDeps) {
    this.deps = deps;
  }

  get lastReport(): HealthReport | null {
    return this.last;
  }

  async run(): Promise<HealthReport> {
    const checks = await Promise.all([
      this.check('api', async () => {
        const assets = await this.deps.api.getAssets();
        return [true, `balance ${assets.balance}`];
      }),
      this.check('notifier', async () => {
        const ok = await this.deps.notifier.ping();
        return [ok, ok ? 'reachable' : 'unreachable'];
      }),
      this.check('disk', async () => {
        const free = await (this.deps.freeDisk ?? statfsFree)(this.deps.diskPath ?? '.');
        return [free >= MIN_FREE_DISK_BYTES, `${(free / (1024 * MB)).toFixed(2)} GB free`];
      }),
      this.check('memory', async () => {
        const mb = rssMb(this.deps.rssBytes);
        if (mb > WARN_RSS_MB) log.warn({ rssMb: mb }, 'Memory usage high');
        return [mb <= MAX_RSS_MB, `${mb.toFixed(1)} MB RSS`];
      }),
      this.check('files', async () => {
        const missing = this.deps.requiredFiles.filter((f) => !existsSync(f));
        ensureDir(this.deps.resultsDir);
        return [missing.length === 0, missing.length === 0 ? 'present' : `missing: ${missing.join(', ')}`];
      }),
    ]);

    const report: HealthReport = { ok: checks.every((c) => c.ok), checkedAt: this.deps.clock.now(), checks };
    this.last = report;
    if (report.ok) log.info('Health check passed');
    else log.warn({ failed: checks.filter((c) => !c.ok).map((c) => c.name) }, 'Health check failed');
    return report;
  }

  private async check(name: string, fn: () => Promise<[boolean, string]>): Promise<HealthCheckResult> {
    try {
      const [ok, detail] = await fn();
      return { name, ok, detail };
    } catch (err) {
      log.error({ err, check: name }, 'Health check errored');
      return { name, ok: false, detail: errorMessage(err) };
    }
  }
}
