import type { Candle, Timeframe } from '../market/candle.schema';

/**
 * Historical candle source used for startup loading and gap backfill.
 *
 * Implementations return candles in ascending `openTs` order with no
 * duplicates, starting at `startTs` (inclusive).
 */
export interface CandleFetcher {
  fetchCandles(
    symbol: string,
    timeframe: Timeframe,
    startTs: number,
    limit: number
  ): Promise<Candle[]>;
}
