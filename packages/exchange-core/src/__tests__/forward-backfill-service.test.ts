import { describe, it, expect, vi } from 'vitest';
import type { Candle, Timeframe } from '@strata/schemas';
import { ForwardBackfillService } from '../backfill/forward-backfill-service';
import { makeCandle } from './fixtures';

type Fetch = (symbol: string, timeframe: Timeframe, startTs: number, limit: number) => Promise<Candle[]>;

describe('ForwardBackfillService', () => {
  it('keeps in-range candles, deduplicates and reports remaining holes', async () => {
    const fetchCandles = vi.fn<Fetch>(async () => [
      makeCandle(1120),
      makeCandle(1060),
      makeCandle(1060, { volume: 20 }),
      makeCandle(1240),
    ]);
    const addCandles = vi.fn(async (_candles: Candle[]) => {});
    const service = new ForwardBackfillService({ fetchCandles }, { addCandles });

    const outcome = await service.request({
      symbol: 'BTCUSDT',
      timeframe: '1m',
      startTs: 1060,
      limit: 3,
    });

    expect(fetchCandles).toHaveBeenCalledWith('BTCUSDT', '1m', 1060, 3);
    expect(outcome.recovered).toEqual([makeCandle(1060, { volume: 20 }), makeCandle(1120)]);
    expect(outcome.stillMissing).toEqual([1180]);
    expect(addCandles).toHaveBeenCalledWith(outcome.recovered);
  });

  it('pages requests larger than the batch size', async () => {
    const fetchCandles = vi.fn<Fetch>(async () => []);
    const service = new ForwardBackfillService({ fetchCandles }, null, { maxBatchSize: 2 });

    const outcome = await service.request({
      symbol: 'BTCUSDT',
      timeframe: '1m',
      startTs: 1060,
      limit: 5,
    });

    expect(fetchCandles.mock.calls).toEqual([
      ['BTCUSDT', '1m', 1060, 2],
      ['BTCUSDT', '1m', 1180, 2],
      ['BTCUSDT', '1m', 1300, 1],
    ]);
    expect(outcome.stillMissing).toEqual([1060, 1120, 1180, 1240, 1300]);
  });

  it('skips persistence when nothing was recovered', async () => {
    const addCandles = vi.fn(async (_candles: Candle[]) => {});
    const service = new ForwardBackfillService({ fetchCandles: async () => [] }, { addCandles });

    await service.request({ symbol: 'BTCUSDT', timeframe: '1m', startTs: 1060, limit: 1 });

    expect(addCandles).not.toHaveBeenCalled();
  });

  it('propagates fetch failures', async () => {
    const addCandles = vi.fn(async (_candles: Candle[]) => {});
    const service = new ForwardBackfillService(
      {
        fetchCandles: async () => {
          throw new Error('HTTP 503');
        },
      },
      { addCandles }
    );

    await expect(
      service.request({ symbol: 'BTCUSDT', timeframe: '1m', startTs: 1060, limit: 1 })
    ).rejects.toThrow('HTTP 503');
    expect(addCandles).not.toHaveBeenCalled();
  });

  it('rejects an invalid batch size', () => {
    expect(() => new ForwardBackfillService({ fetchCandles: async () => [] }, null, { maxBatchSize: 0 }))
      .toThrow('Invalid backfill batch size: 0');
  });
});
