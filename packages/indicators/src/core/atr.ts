/**
 * Average True Range (ATR)
 *
 * Rolling mean of true range. The first bar has no previous close, so
 * only TR[1..] contributes and a value needs `period + 1` bars.
 */

import { type OHLC, trueRangeSeries } from './true-range.js';
import { sma, smaLatest } from './sma.js';

/**
 * Calculate the ATR series for an array of OHLC bars
 * @param bars - Array of OHLC bars (oldest first)
 * @param period - ATR period (default: 14)
 * @returns ATR values; entry k covers bars[k+1 .. k+period]
 */
export function atr(bars: OHLC[], period: number = 14): number[] {
  if (period <= 0) {
    throw new Error('ATR period must be positive');
  }

  return sma(trueRangeSeries(bars).slice(1), period);
}

/**
 * Get the latest ATR value
 * @param bars - Array of OHLC bars (oldest first)
 * @param period - ATR period (default: 14)
 * @returns Latest ATR value or null if fewer than `period + 1` bars
 */
export function atrLatest(bars: OHLC[], period: number = 14): number | null {
  if (period <= 0) {
    throw new Error('ATR period must be positive');
  }
  if (bars.length < period + 1) {
    return null;
  }

  return smaLatest(trueRangeSeries(bars).slice(1), period);
}
