export type ErrorKind =
  | 'TRANSIENT'
  | 'RATE_LIMITED'
  | 'AUTH'
  | 'MALFORMED'
  | 'DOMAIN_INVALID'
  | 'FATAL';

/**
 * Base class for everything the engine throws on purpose.
 * `kind` decides what callers do with it: retry, skip the unit, or halt.
 */
export class TradingError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

/** Network failure, timeout or 5xx. */
export class TransientError extends TradingError {
  readonly statusCode: number | null;

  constructor(message: string, statusCode: number | null = null, options?: { cause?: unknown }) {
    super('TRANSIENT', message, options);
    this.statusCode = statusCode;
  }
}

/** Exchange reported throttling (ERR-5003). */
export class RateLimitedError extends TradingError {
  readonly code: string;

  constructor(code: string, message = `Rate limited by exchange (${code})`) {
    super('RATE_LIMITED', message);
    this.code = code;
  }
}

export class AuthError extends TradingError {
  readonly statusCode: number;

  constructor(statusCode: number, message: string) {
    super('AUTH', message);
    this.statusCode = statusCode;
  }
}

export class MalformedResponseError extends TradingError {
  readonly endpoint: string;

  constructor(endpoint: string, message: string) {
    super('MALFORMED', `${endpoint}: ${message}`);
    this.endpoint = endpoint;
  }
}

/** Exchange answered with a non-zero status that is not throttling. */
export class ExchangeRejectedError extends TradingError {
  readonly code: string | null;

  constructor(code: string | null, message: string) {
    super('DOMAIN_INVALID', message);
    this.code = code;
  }
}

export class InvalidInputError extends TradingError {
  constructor(message: string) {
    super('DOMAIN_INVALID', message);
  }
}

export class QuoteUnavailableError extends TradingError {
  readonly symbol: string;

  constructor(symbol: string) {
    super('DOMAIN_INVALID', `No quote available for ${symbol}`);
    this.symbol = symbol;
  }
}

export class VolumeCapExceededError extends TradingError {
  readonly symbol: string;
  readonly current: number;
  readonly requested: number;
  readonly cap: number;

  constructor(symbol: string, current: number, requested: number, cap: number) {
    super(
      'DOMAIN_INVALID',
      `Daily volume cap for ${symbol} would be exceeded: ${current} + ${requested} > ${cap}`,
    );
    this.symbol = symbol;
    this.current = current;
    this.requested = requested;
    this.cap = cap;
  }
}

export class ConfigError extends TradingError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super('DOMAIN_INVALID', `Invalid configuration:\n${issues.map((i) => `  - ${i}`).join('\n')}`);
    this.issues = issues;
  }
}

export class FatalError extends TradingError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('FATAL', message, options);
  }
}

export function isRetryable(err: unknown): boolean {
  return err instanceof TradingError && (err.kind === 'TRANSIENT' || err.kind === 'RATE_LIMITED');
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
