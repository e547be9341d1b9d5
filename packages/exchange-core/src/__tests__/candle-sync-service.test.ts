import { describe, it, expect, vi } from 'vitest';
import type { BackfillRequest, Candle, Timeframe } from '@strata/schemas';
import { CandleSyncService } from '../sync/candle-sync-service';
import type { BackfillOutcome } from '../backfill/types';
import { BASE_TS, makeCandle } from './fixtures';

function makeService(
  request: (req: BackfillRequest) => Promise<BackfillOutcome> = async (req) => ({
    request: req,
    recovered: [],
    stillMissing: [],
  })
) {
  const backfill = { request: vi.fn(request) };
  const service = new CandleSyncService({ backfill });
  return { service, backfill };
}

describe('CandleSyncService', () => {
  it('accepts in-sequence candles and emits candle:accepted', () => {
    const { service, backfill } = makeService();
    const accepted = vi.fn();
    service.on('candle:accepted', accepted);

    service.register('BTCUSDT', '1m').seed(1000);
    const result = service.onClosedCandle('BTCUSDT', '1m', makeCandle(1060));

    expect(result).toEqual({ status: 'accepted', openTs: 1060, bootstrap: false });
    expect(accepted).toHaveBeenCalledWith(makeCandle(1060), false);
    expect(backfill.request).not.toHaveBeenCalled();
  });

  it('does not wait on backfill before accepting the next candle', () => {
    // Backfill that never settles
    const { service, backfill } = makeService(() => new Promise<BackfillOutcome>(() => {}));
    const gaps = vi.fn();
    service.on('gap:detected', gaps);

    service.register('BTCUSDT', '1m').seed(1000);
    const gap = service.onClosedCandle('BTCUSDT', '1m', makeCandle(1180));
    const next = service.onClosedCandle('BTCUSDT', '1m', makeCandle(1240));

    expect(gap.status).toBe('gap-detected');
    expect(next).toEqual({ status: 'accepted', openTs: 1240, bootstrap: false });
    expect(backfill.request).toHaveBeenCalledTimes(1);
    expect(backfill.request).toHaveBeenCalledWith({
      symbol: 'BTCUSDT',
      timeframe: '1m',
      startTs: 1060,
      limit: 2,
    });
    expect(gaps).toHaveBeenCalledWith(
      makeCandle(1180),
      { start: 1060, end: 1120, missing: 2 },
      { symbol: 'BTCUSDT', timeframe: '1m', startTs: 1060, limit: 2 }
    );
  });

  it('emits backfill:complete with the outcome', async () => {
    const recovered = [makeCandle(1060)];
    const { service } = makeService(async (req) => ({ request: req, recovered, stillMissing: [] }));
    const complete = vi.fn();
    service.on('backfill:complete', complete);

    service.register('BTCUSDT', '1m').seed(1000);
    service.onClosedCandle('BTCUSDT', '1m', makeCandle(1120));
    await service.drain();

    expect(complete).toHaveBeenCalledWith({
      request: { symbol: 'BTCUSDT', timeframe: '1m', startTs: 1060, limit: 1 },
      recovered,
      stillMissing: [],
    });
  });

  it('turns a failed backfill into backfill:failed without throwing', async () => {
    const { service } = makeService(async () => {
      throw new Error('upstream unavailable');
    });
    const failed = vi.fn<(request: BackfillRequest, error: Error) => void>();
    service.on('backfill:failed', failed);

    service.register('BTCUSDT', '1m').seed(1000);
    service.onClosedCandle('BTCUSDT', '1m', makeCandle(1120));
    await service.drain();

    expect(failed).toHaveBeenCalledTimes(1);
    expect(failed.mock.calls[0][0]).toEqual({
      symbol: 'BTCUSDT',
      timeframe: '1m',
      startTs: 1060,
      limit: 1,
    });
    expect(failed.mock.calls[0][1].message).toBe('upstream unavailable');
    expect(service.get('BTCUSDT', '1m')?.snapshot().lastOpenTs).toBe(1120);
  });

  it('still dispatches the backfill when a gap:detected listener throws', async () => {
    const { service, backfill } = makeService();
    service.on('gap:detected', () => {
      throw new Error('listener broke');
    });

    service.register('BTCUSDT', '1m').seed(BASE_TS);
    const result = service.onClosedCandle('BTCUSDT', '1m', makeCandle(BASE_TS + 180));
    await service.drain();

    expect(result.status).toBe('gap-detected');
    expect(backfill.request).toHaveBeenCalledWith({
      symbol: 'BTCUSDT',
      timeframe: '1m',
      startTs: BASE_TS + 60,
      limit: 2,
    });
  });

  it('keeps accepting candles when a candle:accepted listener throws', () => {
    const { service } = makeService();
    service.on('candle:accepted', () => {
      throw new Error('listener broke');
    });

    service.register('BTCUSDT', '1m').seed(BASE_TS);

    expect(service.onClosedCandle('BTCUSDT', '1m', makeCandle(BASE_TS + 60)).status).toBe('accepted');
    expect(service.onClosedCandle('BTCUSDT', '1m', makeCandle(BASE_TS + 120)).status).toBe('accepted');
    expect(service.get('BTCUSDT', '1m')?.snapshot().lastOpenTs).toBe(BASE_TS + 120);
  });

  it('rejects an unclosed candle and accepts it once closed', () => {
    const { service } = makeService();
    const rejected = vi.fn();
    service.on('candle:rejected', rejected);

    service.register('BTCUSDT', '1m').seed(BASE_TS);
    const open = service.onClosedCandle('BTCUSDT', '1m', makeCandle(BASE_TS + 60, { isClosed: false }));
    const closed = service.onClosedCandle('BTCUSDT', '1m', makeCandle(BASE_TS + 60));

    expect(open).toEqual({ status: 'rejected-invalid', openTs: BASE_TS + 60, reason: 'candle is not closed' });
    expect(rejected).toHaveBeenCalledTimes(1);
    expect(closed).toEqual({ status: 'accepted', openTs: BASE_TS + 60, bootstrap: false });
  });

  it('returns rejected-invalid for a malformed candle', () => {
    const { service } = makeService();
    const rejected = vi.fn();
    service.on('candle:rejected', rejected);

    const result = service.onClosedCandle('BTCUSDT', '1m', makeCandle(1060, { high: 98 }));

    expect(result.status).toBe('rejected-invalid');
    expect(result.openTs).toBeNull();
    expect(rejected).toHaveBeenCalledTimes(1);
    expect(service.get('BTCUSDT', '1m')).toBeUndefined();
  });

  it('emits candle:rejected for stale candles', () => {
    const { service } = makeService();
    const rejected = vi.fn();
    service.on('candle:rejected', rejected);

    service.register('BTCUSDT', '1m').seed(1120);
    service.onClosedCandle('BTCUSDT', '1m', makeCandle(1060));

    expect(rejected).toHaveBeenCalledWith(
      { status: 'rejected-stale', openTs: 1060, lastOpenTs: 1120 },
      'BTCUSDT',
      '1m'
    );
  });

  it('keeps pairs independent', () => {
    const { service } = makeService();

    service.onClosedCandle('BTCUSDT', '1m', makeCandle(1000));
    service.onClosedCandle('ETHUSDT', '1m', makeCandle(5000, { symbol: 'ETHUSDT' }));

    expect(service.snapshots().map((s) => [s.symbol, s.lastOpenTs])).toEqual([
      ['BTCUSDT', 1000],
      ['ETHUSDT', 5000],
    ]);
  });

  describe('seedFromStore()', () => {
    it('looks up each pair once and seeds those with history', async () => {
      const { service } = makeService();
      const getLastCandle = vi.fn(async (symbol: string, timeframe: Timeframe): Promise<Candle | null> => {
        if (symbol === 'BTCUSDT' && timeframe === '1m') return makeCandle(1000);
        if (timeframe === '5m') throw new Error('connection reset');
        return null;
      });

      const seeded = await service.seedFromStore({ getLastCandle }, [
        { symbol: 'BTCUSDT', timeframe: '1m' },
        { symbol: 'ETHUSDT', timeframe: '1m' },
        { symbol: 'BTCUSDT', timeframe: '5m' },
      ]);

      expect(seeded).toBe(1);
      expect(getLastCandle).toHaveBeenCalledTimes(3);
      expect(service.get('BTCUSDT', '1m')?.snapshot().lastOpenTs).toBe(1000);
      expect(service.get('ETHUSDT', '1m')?.isSeeded()).toBe(false);
      expect(service.get('BTCUSDT', '5m')?.isSeeded()).toBe(false);
    });
  });
});
