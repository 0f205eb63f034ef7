import { describe, it, expect, vi } from 'vitest';
import { RetryPolicy } from '../src/util/retry.js';
import { Mutex, KeyedMutex } from '../src/util/mutex.js';
import { FakeClock } from './helpers/fake-clock.js';

describe('RetryPolicy', () => {
  it('retries until success with a fixed interval', async () => {
    const clock = new FakeClock(0);
    const policy = new RetryPolicy({ attempts: 3, delayMs: 1000 }, clock);
    const op = vi.fn().mockRejectedValueOnce(new Error('a')).mockRejectedValueOnce(new Error('b')).mockResolvedValue('ok');

    expect(await policy.run(op)).toBe('ok');
    expect(op).toHaveBeenCalledTimes(3);
    expect(clock.sleeps).toEqual([1000, 1000]);
  });

  it('rethrows the last error once attempts run out', async () => {
    const clock = new FakeClock(0);
    const policy = new RetryPolicy({ attempts: 2, delayMs: 10 }, clock);

    await expect(policy.run(async (n) => Promise.reject(new Error(`fail ${n}`)))).rejects.toThrow('fail 2');
  });

  it('stops at the first non-retryable error', async () => {
    const clock = new FakeClock(0);
    const policy = new RetryPolicy({ attempts: 5, delayMs: 10, shouldRetry: () => false }, clock);
    const op = vi.fn().mockRejectedValue(new Error('fatal'));

    await expect(policy.run(op)).rejects.toThrow('fatal');
    expect(op).toHaveBeenCalledTimes(1);
    expect(clock.sleeps).toEqual([]);
  });

  it('backs off exponentially up to the cap', () => {
    const policy = new RetryPolicy({ attempts: 6, delayMs: 100, backoffFactor: 2, maxDelayMs: 500 });

    expect([1, 2, 3, 4].map((n) => policy.delayFor(n))).toEqual([100, 200, 400, 500]);
  });

  it('adds jitter from the random source', () => {
    const policy = new RetryPolicy({ attempts: 2, delayMs: 100, jitterMs: 50 }, new FakeClock(0), () => 0.5);

    expect(policy.delayFor(1)).toBe(125);
  });

  it('polls until a value appears', async () => {
    const clock = new FakeClock(0);
    const policy = new RetryPolicy({ attempts: 5, delayMs: 3000 }, clock);
    const values = [null, null, 'P1'];

    const found = await policy.poll(async (n) => values[n - 1] ?? null);

    expect(found).toBe('P1');
    expect(clock.sleeps).toEqual([3000, 3000]);
  });

  it('returns null from poll when nothing appears', async () => {
    const clock = new FakeClock(0);
    const policy = new RetryPolicy({ attempts: 3, delayMs: 1000 }, clock);

    expect(await policy.poll(async () => null)).toBeNull();
    expect(clock.sleeps).toEqual([1000, 1000]);
  });
});

describe('Mutex', () => {
  it('runs critical sections one at a time in arrival order', async () => {
    const mutex = new Mutex();
    const order: string[] = [];
    const section = (name: string) => async () => {
      order.push(`${name}:in`);
      await Promise.resolve();
      order.push(`${name}:out`);
    };

    await Promise.all([mutex.runExclusive(section('a')), mutex.runExclusive(section('b'))]);

    expect(order).toEqual(['a:in', 'a:out', 'b:in', 'b:out']);
    expect(mutex.isLocked).toBe(false);
  });

  it('releases the lock when a section throws', async () => {
    const mutex = new Mutex();

    await expect(mutex.runExclusive(() => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    expect(await mutex.runExclusive(() => 'next')).toBe('next');
  });

  it('does not block across keys', async () => {
    const keyed = new KeyedMutex();
    const order: string[] = [];
    let releaseA: () => void = () => undefined;
    const gate = new Promise<void>((r) => {
      releaseA = r;
    });

    const a = keyed.runExclusive('USD_JPY', async () => {
      await gate;
      order.push('a');
    });
    await keyed.runExclusive('EUR_JPY', () => {
      order.push('b');
    });
    releaseA();
    await a;

    expect(order).toEqual(['b', 'a']);
  });
});
