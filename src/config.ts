import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors.js';

dotenv.config();

function env(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

/** Settings needed before the full configuration is validated (logger). */
export const bootConfig = {
  logLevel: env('LOG_LEVEL', 'info'),
} as const;

const blankToUndefined = (v: unknown): unknown =>
  typeof v === 'string' && v.trim() === '' ? undefined : v;

function numberIn(min: number, max: number, fallback: number) {
  return z.preprocess(blankToUndefined, z.coerce.number().min(min).max(max).default(fallback));
}

function intIn(min: number, max: number, fallback: number) {
  return z.preprocess(blankToUndefined, z.coerce.number().int().min(min).max(max).default(fallback));
}

const required = z.string({ required_error: 'is required' }).trim().min(1, 'is required');

const flag = z.preprocess(
  (v) => (typeof v === 'string' ? v.trim().toUpperCase() : v),
  z.enum(['TRUE', 'FALSE']).default('TRUE'),
);

const envSchema = z.object({
  FX_API_KEY: required,
  FX_API_SECRET: required,
  FX_PRIVATE_BASE_URL: z.string().url().default('https://forex-api.coin.z.com/private'),
  FX_PUBLIC_BASE_URL: z.string().url().default('https://forex-api.coin.z.com/public'),
  HTTP_TIMEOUT_MS: intIn(1000, 60_000, 15_000),

  SPREAD_THRESHOLD: numberIn(0.001, 1, 0.01),
  JITTER_SECONDS: numberIn(0, 60, 3),
  ENTRY_ORDER_RETRY_INTERVAL: numberIn(1, 60, 5),
  MAX_ENTRY_ORDER_ATTEMPTS: intIn(1, 10, 3),
  EXIT_ORDER_RETRY_INTERVAL: numberIn(1, 60, 10),
  MAX_EXIT_ORDER_ATTEMPTS: intIn(1, 10, 3),
  STOP_LOSS_PIPS: numberIn(0, 1000, 0),
  TAKE_PROFIT_PIPS: numberIn(0, 1000, 0),
  POSITION_CHECK_INTERVAL: numberIn(1, 60, 5),
  POSITION_CHECK_INTERVAL_MINUTES: numberIn(1, 99, 10),
  LEVERAGE: numberIn(1, 100, 10),
  RISK_RATIO: numberIn(0.1, 1, 1),
  AUTOLOT: flag,
  AUTO_RESTART_HOUR: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).max(24).optional()),
  SYMBOL_DAILY_VOLUME_LIMIT: intIn(1, 1_000_000_000, 15_000_000),

  PLAN_FILE: z.string().default('trades.csv'),
  RESULTS_DIR: z.string().default('daily_results'),

  TELEGRAM_BOT_TOKEN: required,
  TELEGRAM_CHAT_ID: required,

  ADMIN_PORT: intIn(1, 65_535, 4000),
  ADMIN_JWT_SECRET: z.string().default(''),
});

export interface AppConfig {
  api: {
    apiKey: string;
    apiSecret: string;
    privateBaseUrl: string;
    publicBaseUrl: string;
    timeoutMs: number;
  };
  trading: {
    spreadThreshold: number;
    jitterSeconds: number;
    entryRetryIntervalSec: number;
    maxEntryAttempts: number;
    exitRetryIntervalSec: number;
    maxExitAttempts: number;
    leverage: number;
    riskRatio: number;
    autoLot: boolean;
    dailyVolumeLimit: number;
  };
  monitor: {
    stopLossPips: number;
    takeProfitPips: number;
    checkIntervalSec: number;
    sweepIntervalMin: number;
  };
  supervisor: {
    /** Hour 0-23 for the daily restart, null to disable. */
    autoRestartHour: number | null;
  };
  paths: {
    planFile: string;
    resultsDir: string;
  };
  telegram: {
    botToken: string;
    chatId: string;
  };
  admin: {
    port: number;
    jwtSecret: string;
  };
}

/**
 * Validates raw settings (normally process.env) into an AppConfig.
 * Throws ConfigError listing every offending key.
 */
export function loadConfig(source: Record<string, string | undefined> = process.env): AppConfig {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigError(issues);
  }
  const e = result.data;
  return {
    api: {
      apiKey: e.FX_API_KEY,
      apiSecret: e.FX_API_SECRET,
      privateBaseUrl: e.FX_PRIVATE_BASE_URL,
      publicBaseUrl: e.FX_PUBLIC_BASE_URL,
      timeoutMs: e.HTTP_TIMEOUT_MS,
    },
    trading: {
      spreadThreshold: e.SPREAD_THRESHOLD,
      jitterSeconds: e.JITTER_SECONDS,
      entryRetryIntervalSec: e.ENTRY_ORDER_RETRY_INTERVAL,
      maxEntryAttempts: e.MAX_ENTRY_ORDER_ATTEMPTS,
      exitRetryIntervalSec: e.EXIT_ORDER_RETRY_INTERVAL,
      maxExitAttempts: e.MAX_EXIT_ORDER_ATTEMPTS,
      leverage: e.LEVERAGE,
      riskRatio: e.RISK_RATIO,
      autoLot: e.AUTOLOT === 'TRUE',
      dailyVolumeLimit: e.SYMBOL_DAILY_VOLUME_LIMIT,
    },
    monitor: {
      stopLossPips: e.STOP_LOSS_PIPS,
      takeProfitPips: e.TAKE_PROFIT_PIPS,
      checkIntervalSec: e.POSITION_CHECK_INTERVAL,
      sweepIntervalMin: e.POSITION_CHECK_INTERVAL_MINUTES,
    },
    supervisor: {
      // 24 means midnight
      autoRestartHour: e.AUTO_RESTART_HOUR === undefined ? null : e.AUTO_RESTART_HOUR % 24,
    },
    paths: {
      planFile: e.PLAN_FILE,
      resultsDir: e.RESULTS_DIR,
    },
    telegram: {
      botToken: e.TELEGRAM_BOT_TOKEN,
      chatId: e.TELEGRAM_CHAT_ID,
    },
    admin: {
      port: e.ADMIN_PORT,
      jwtSecret: e.ADMIN_JWT_SECRET,
    },
  };
}
