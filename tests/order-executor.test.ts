import { describe, it, expect } from 'vitest';
import { AuthError, FatalError, TransientError } from '../src/errors.js';
import { buildEngine, scheduledTrade, trackedPosition } from './helpers/engine.js';

describe('OrderExecutor.enter', () => {
  it('sizes from available margin and opens one position', async () => {
    const { clock, exchange, executor, registry, volume } = buildEngine();

    const outcome = await executor.enter(scheduledTrade(clock));

    expect(outcome).toMatchObject({
      status: 'OPENED',
      adopted: false,
      position: { positionId: 'P1', size: 6333, entryPrice: 150 },
    });
    expect(exchange.placed).toEqual([{ symbol: 'USD_JPY', side: 'BUY', size: 6333 }]);
    expect(registry.get('P1')?.machine?.current).toBe('MONITORING');
    expect(volume.get('USD_JPY')).toBe(6333);
    expect(clock.sleeps).toEqual([]);
  });

  it('uses the plan lot without reading the balance', async () => {
    const { clock, exchange, executor } = buildEngine();

    await executor.enter(scheduledTrade(clock, { lotSize: 1000 }));

    expect(exchange.placed).toEqual([{ symbol: 'USD_JPY', side: 'BUY', size: 1000 }]);
    expect(exchange.assetCalls).toBe(0);
  });

  it('sizes an empty lot at leverage 18 when automatic lots are off', async () => {
    const { clock, exchange, executor } = buildEngine({ settings: { autoLot: false } });

    await executor.enter(scheduledTrade(clock));

    expect(exchange.placed[0]?.size).toBe(11400);
  });

  it('retries a wide spread and gives up without ordering', async () => {
    const { clock, exchange, executor, channel } = buildEngine();
    exchange.setQuote('USD_JPY', 149.9, 150.0);

    const outcome = await executor.enter(scheduledTrade(clock));

    expect(outcome).toEqual({ status: 'FAILED', reason: 'no entry after 3 attempts', orderPlaced: false });
    expect(exchange.placed).toEqual([]);
    expect(clock.sleeps).toEqual([5000, 5000]);
    expect(channel.messages.filter((m) => m.includes('Spread too wide'))).toHaveLength(3);
  });

  it('rejects an order that would pass the daily volume cap before sending it', async () => {
    const { clock, exchange, executor, volume } = buildEngine({ volumeCap: 5000 });

    const outcome = await executor.enter(scheduledTrade(clock));

    expect(outcome).toMatchObject({ status: 'FAILED', orderPlaced: false });
    expect(exchange.placed).toEqual([]);
    expect(volume.get('USD_JPY')).toBe(0);
    expect(clock.sleeps).toEqual([]);
  });

  it('adopts the position when a placement error hid a filled order', async () => {
    const { clock, exchange, executor, volume, registry } = buildEngine();
    exchange.placeErrorsAfterFill.push(new TransientError('socket hang up'));

    const outcome = await executor.enter(scheduledTrade(clock));

    expect(outcome).toMatchObject({ status: 'OPENED', adopted: true, position: { positionId: 'P1' } });
    expect(exchange.placed).toHaveLength(1);
    expect(volume.get('USD_JPY')).toBe(6333);
    expect(registry.get('P1')?.tradeIndex).toBe(1);
    expect(clock.sleeps).toEqual([5000]);
  });

  it('reads live quotes for the spread check and the sizing', async () => {
    const { clock, exchange, executor } = buildEngine();

    await executor.enter(scheduledTrade(clock));

    expect(exchange.quoteReads).toEqual([
      { symbols: ['USD_JPY'], fresh: true },
      { symbols: ['USD_JPY'], fresh: true },
    ]);
  });

  it('leaves an unowned position alone when no order was sent', async () => {
    const { clock, exchange, executor, registry, volume } = buildEngine();
    exchange.setQuote('USD_JPY', 149.9, 150.0);
    exchange.addPosition({ positionId: 'X1' });

    const outcome = await executor.enter(scheduledTrade(clock));

    expect(outcome).toEqual({ status: 'FAILED', reason: 'no entry after 3 attempts', orderPlaced: false });
    expect(registry.has('X1')).toBe(false);
    expect(exchange.positions.map((p) => p.positionId)).toEqual(['X1']);
    expect(volume.get('USD_JPY')).toBe(0);
  });

  it('adopts in the final check when the last placement errored after filling', async () => {
    const { clock, exchange, executor, registry } = buildEngine();
    exchange.placeErrors.push(new TransientError('timeout'), new TransientError('timeout'));
    exchange.placeErrorsAfterFill.push(new TransientError('socket hang up'));

    const outcome = await executor.enter(scheduledTrade(clock));

    expect(outcome).toMatchObject({ status: 'OPENED', adopted: true, position: { positionId: 'P1' } });
    expect(exchange.placed).toHaveLength(1);
    expect(registry.has('P1')).toBe(true);
    expect(clock.sleeps).toEqual([5000, 5000]);
  });

  it('escalates rejected credentials to a fatal error', async () => {
    const { clock, exchange, executor, volume } = buildEngine();
    exchange.placeErrors.push(new AuthError(401, 'invalid API key'));

    const entry = executor.enter(scheduledTrade(clock));

    await expect(entry).rejects.toBeInstanceOf(FatalError);
    await expect(entry).rejects.toThrow('Exchange rejected the API credentials (401): invalid API key');
    expect(exchange.placed).toEqual([]);
    expect(volume.get('USD_JPY')).toBe(0);
    expect(clock.sleeps).toEqual([]);
  });

  it('never re-places an accepted order whose position cannot be resolved', async () => {
    const { clock, exchange, executor, volume } = buildEngine();
    exchange.hideExecutions = true;

    const outcome = await executor.enter(scheduledTrade(clock));

    expect(outcome).toMatchObject({ status: 'FAILED', orderPlaced: true });
    expect(exchange.placed).toHaveLength(1);
    expect(volume.get('USD_JPY')).toBe(6333);
    expect(clock.sleeps).toEqual([1000, 1000]);
  });
});

describe('OrderExecutor.close', () => {
  it('records one result priced from the close fills', async () => {
    const { clock, exchange, executor, registry, trades } = buildEngine();
    await executor.enter(scheduledTrade(clock));
    exchange.setQuote('USD_JPY', 150.5, 150.51);
    const tracked = trackedPosition(registry, 'P1');

    const outcome = await executor.close(tracked, 'SCHEDULED');

    expect(outcome).toMatchObject({
      status: 'CLOSED',
      result: { symbol: 'USD_JPY', side: 'BUY', entryPrice: 150, exitPrice: 150.5, profitPips: 50, profitAmount: 3166.5, lotSize: 6333 },
    });
    expect(exchange.closes).toEqual([{ positionId: 'P1', side: 'SELL', size: 6333 }]);
    expect(tracked.machine?.current).toBe('CLOSED');
    expect(registry.has('P1')).toBe(false);
    expect(trades.pending()).toHaveLength(1);
  });

  it('adds entry and close fees to the day total', async () => {
    const { clock, exchange, executor, registry, trades } = buildEngine();
    exchange.fee = 3;
    await executor.enter(scheduledTrade(clock));

    await executor.close(trackedPosition(registry, 'P1'), 'SCHEDULED');

    expect(trades.feeTotal).toBe(6);
  });

  it('books a profit on a SELL when the price falls', async () => {
    const { clock, exchange, executor, registry } = buildEngine();
    await executor.enter(scheduledTrade(clock, { side: 'SELL' }));
    exchange.setQuote('USD_JPY', 149.49, 149.5);

    const outcome = await executor.close(trackedPosition(registry, 'P1'), 'SCHEDULED');

    if (outcome.status !== 'CLOSED') throw new Error(`unexpected ${outcome.status}`);
    expect(outcome.result.profitPips).toBe(49);
    expect(outcome.result.profitAmount).toBeCloseTo(3103.17, 2);
  });

  it('backs off when another exit path holds the claim', async () => {
    const { clock, exchange, executor, registry } = buildEngine();
    await executor.enter(scheduledTrade(clock));
    registry.claimExit('P1', 'STOP_LOSS');

    const outcome = await executor.close(trackedPosition(registry, 'P1'), 'SCHEDULED');

    expect(outcome).toEqual({ status: 'ALREADY_CLAIMED', by: 'STOP_LOSS' });
    expect(exchange.closes).toEqual([]);
  });

  it('falls back to a manual close after the retries', async () => {
    const { clock, exchange, executor, registry, channel } = buildEngine();
    await executor.enter(scheduledTrade(clock));
    exchange.closeErrors.push(new TransientError('timeout'), new TransientError('timeout'), new TransientError('timeout'));

    const outcome = await executor.close(trackedPosition(registry, 'P1'), 'SCHEDULED');

    expect(outcome).toMatchObject({ status: 'CLOSED', result: { exitPrice: 149.99, profitPips: -1 } });
    expect(clock.sleeps).toEqual([10000, 10000]);
    expect(exchange.closes).toHaveLength(1);
    expect(channel.messages.some((m) => m.startsWith('⚠️ Manual close executed'))).toBe(true);
  });

  it('keeps ownership after a failed close so the position can be closed again', async () => {
    const { clock, exchange, executor, registry } = buildEngine();
    await executor.enter(scheduledTrade(clock));
    for (let i = 0; i < 4; i++) exchange.closeErrors.push(new TransientError('timeout'));
    const tracked = trackedPosition(registry, 'P1');

    const failed = await executor.close(tracked, 'SCHEDULED');
    expect(failed.status).toBe('FAILED');
    expect(tracked.machine?.current).toBe('FAILED');
    expect(registry.has('P1')).toBe(true);
    expect(registry.claimedBy('P1')).toBeNull();

    const retried = await executor.close(tracked, 'STOP_LOSS');
    expect(retried.status).toBe('CLOSED');
    expect(tracked.machine?.current).toBe('CLOSED');
  });

  it('closes tracked and unknown positions on close-all', async () => {
    const { clock, exchange, executor, trades } = buildEngine();
    await executor.enter(scheduledTrade(clock));
    exchange.addPosition({ positionId: 'X9', side: 'SELL', entryPrice: 151, size: 500 });

    const summary = await executor.closeAll('SHUTDOWN');

    expect(summary).toEqual({ closed: 2, failed: 0 });
    expect(exchange.positions).toEqual([]);
    expect(trades.pending()).toHaveLength(2);
  });
});
