import type { Candle, Timeframe } from '../market/candle.schema';

/**
 * Destination for recovered and live candles
 */
export interface CandleSink {
  addCandles(candles: Candle[]): Promise<void>;
}

/**
 * Persisted candle storage consulted at startup
 */
export interface CandleStore extends CandleSink {
  /** Latest persisted candle, used once per (symbol, timeframe) to seed sync state */
  getLastCandle(symbol: string, timeframe: Timeframe): Promise<Candle | null>;
  addCandle(candle: Candle): Promise<void>;
  /** Most recent `count` candles, oldest first */
  getRecentCandles(symbol: string, timeframe: Timeframe, count: number): Promise<Candle[]>;
}
