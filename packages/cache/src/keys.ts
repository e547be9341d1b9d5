import type { Timeframe } from '@strata/schemas';

/**
 * Sorted set holding closed candles for one series, scored by openTs
 *
 * @example candleKey('BTCUSDT', '5m') // 'candles:BTCUSDT:5m'
 */
export function candleKey(symbol: string, timeframe: Timeframe): string {
  return `candles:${symbol}:${timeframe}`;
}
