import { request as undiciRequest } from 'undici';
import type { z } from 'zod';
import { createChildLogger } from '../../logger.js';
import {
  AuthError,
  ExchangeRejectedError,
  MalformedResponseError,
  RateLimitedError,
  TransientError,
  isRetryable,
} from '../../errors.js';
import { AdaptiveRateLimiter } from '../../execution/rate-limiter.js';
import { systemClock, type Clock, type RandomSource } from '../../util/clock.js';
import { RetryPolicy } from '../../util/retry.js';
import { buildAuthHeaders } from './auth.js';
import { envelopeSchema } from './schemas.js';
import { PRIVATE_BASE, PUBLIC_BASE, THROTTLE_CODE } from './endpoints.js';

const log = createChildLogger('forex-client');

export type HttpMethod = 'GET' | 'POST';

export interface HttpRequest {
  method: HttpMethod;
  headers: Record<string, string>;
  body?: string;
  timeoutMs: number;
}

export interface HttpResponse {
  statusCode: number;
  text: string;
}

/** Sends one HTTP request. Swapped for a stub in tests. */
export type HttpTransport = (url: string, req: HttpRequest) => Promise<HttpResponse>;

export const undiciTransport: HttpTransport = async (url, req) => {
  const res = await undiciRequest(url, {
    method: req.method,
    headers: req.headers,
    body: req.body,
    headersTimeout: req.timeoutMs,
    bodyTimeout: req.timeoutMs,
  });
  return { statusCode: res.statusCode, text: await res.body.text() };
};

export interface ApiClientOptions {
  apiKey: string;
  apiSecret: string;
  privateBaseUrl?: string;
  publicBaseUrl?: string;
  timeoutMs?: number;
}

export interface ApiClientDeps {
  transport?: HttpTransport;
  limiter?: AdaptiveRateLimiter;
  clock?: Clock;
  random?: RandomSource;
  /** overrides the default 3-attempt exponential backoff */
  retry?: RetryPolicy;
}

export interface CallOptions {
  query?: Record<string, string>;
  body?: unknown;
  /** public endpoints are not signed */
  visibility?: 'private' | 'public';
}

export interface ApiCallStats {
  calls: number;
  errors: number;
}

const DEFAULT_TIMEOUT_MS = 15_000;

const UNDICI_TIMEOUT_CODES = new Set([
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
  'UND_ERR_CONNECT_TIMEOUT',
]);

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/**
 * Signed, rate-limited, retrying client for the forex REST API.
 * Every exchange call in the process goes through one instance.
 */
export class SignedApiClient {
  private readonly apiKey: string;
  private readonly apiSecret: string;
  private readonly privateBaseUrl: string;
  private readonly publicBaseUrl: string;
  private readonly timeoutMs: number;
  private readonly transport: HttpTransport;
  private readonly clock: Clock;
  private readonly retry: RetryPolicy;
  readonly limiter: AdaptiveRateLimiter;
  private readonly counters: ApiCallStats = { calls: 0, errors: 0 };

  constructor(options: ApiClientOptions, deps: ApiClientDeps = {}) {
    this.apiKey = options.apiKey;
    this.apiSecret = options.apiSecret;
    this.privateBaseUrl = options.privateBaseUrl ?? PRIVATE_BASE;
    this.publicBaseUrl = options.publicBaseUrl ?? PUBLIC_BASE;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.transport = deps.transport ?? undiciTransport;
    this.clock = deps.clock ?? systemClock;
    const random = deps.random ?? Math.random;
    this.limiter = deps.limiter ?? new AdaptiveRateLimiter({}, this.clock, random);
    this.retry =
      deps.retry ??
      new RetryPolicy(
        {
          attempts: 3,
          delayMs: 1000,
          backoffFactor: 2,
          maxDelayMs: 60_000,
          jitterMs: 1000,
          shouldRetry: isRetryable,
          onRetry: (err, attempt, delay) => {
            log.warn({ err, attempt, delay }, 'Retryable API failure, backing off');
          },
        },
        this.clock,
        random,
      );
  }

  stats(): ApiCallStats {
    return { ...this.counters };
  }

  /**
   * One logical call: gated, signed, retried on transient failure, and the
   * envelope's `data` validated against `schema`.
   */
  async call<T>(
    method: HttpMethod,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: CallOptions = {},
  ): Promise<T> {
    try {
      return await this.retry.run(() => this.attempt(method, path, schema, options));
    } catch (err) {
      if (err instanceof RateLimitedError) {
        throw new TransientError(`${method} ${path}: still throttled after retries`, null, { cause: err });
      }
      throw err;
    }
  }

  private async attempt<T>(
    method: HttpMethod,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: CallOptions,
  ): Promise<T> {
    await this.limiter.acquire(method);
    this.counters.calls++;
    try {
      const envelope = await this.send(method, path, options);
      const result = schema.safeParse(envelope.data);
      if (!result.success) {
        log.warn({ path, issues: result.error.issues, data: envelope.data }, 'Response validation failed');
        throw new MalformedResponseError(path, result.error.message);
      }
      return result.data;
    } catch (err) {
      this.counters.errors++;
      throw err;
    }
  }

  private async send(method: HttpMethod, path: string, options: CallOptions) {
    const isPublic = options.visibility === 'public';
    const url = new URL((isPublic ? this.publicBaseUrl : this.privateBaseUrl) + path);
    Object.entries(options.query ?? {}).forEach(([k, v]) => url.searchParams.set(k, v));

    const body = method === 'POST' && options.body !== undefined ? JSON.stringify(options.body) : '';
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (body) headers['Content-Type'] = 'application/json';
    if (!isPublic) {
      Object.assign(headers, buildAuthHeaders(this.apiKey, this.apiSecret, method, path, body, this.clock.now()));
    }

    let res: HttpResponse;
    try {
      res = await this.transport(url.toString(), {
        method,
        headers,
        body: body || undefined,
        timeoutMs: this.timeoutMs,
      });
    } catch (err) {
      const code = errorCode(err);
      const reason = code && UNDICI_TIMEOUT_CODES.has(code) ? 'timed out' : 'network failure';
      throw new TransientError(`${method} ${path}: ${reason}`, null, { cause: err });
    }

    if (res.statusCode === 401 || res.statusCode === 403) {
      log.error({ statusCode: res.statusCode, path }, 'Auth error, check API key and secret');
      throw new AuthError(res.statusCode, `${method} ${path}: auth rejected (${res.statusCode})`);
    }
    if (res.statusCode === 429) {
      this.limiter.recordThrottle();
      throw new RateLimitedError('HTTP_429');
    }
    if (res.statusCode >= 500) {
      throw new TransientError(`${method} ${path}: server error ${res.statusCode}`, res.statusCode);
    }

    let raw: unknown;
    try {
      raw = res.text ? JSON.parse(res.text) : {};
    } catch {
      throw new MalformedResponseError(path, `non-JSON body (HTTP ${res.statusCode})`);
    }
    const parsed = envelopeSchema.safeParse(raw);
    if (!parsed.success) {
      throw new MalformedResponseError(path, `unexpected envelope (HTTP ${res.statusCode})`);
    }
    const envelope = parsed.data;

    if (envelope.status !== 0) {
      const first = envelope.messages?.[0];
      const code = first?.message_code ?? null;
      if (code === THROTTLE_CODE) {
        this.limiter.recordThrottle();
        throw new RateLimitedError(code);
      }
      this.limiter.recordSuccess();
      log.warn({ path, status: envelope.status, code, message: first?.message_string }, 'Exchange rejected request');
      throw new ExchangeRejectedError(code, `${method} ${path}: ${code ?? 'status ' + envelope.status} ${first?.message_string ?? ''}`.trim());
    }
    this.limiter.recordSuccess();
    return envelope;
  }
}
