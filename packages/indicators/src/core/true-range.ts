/**
 * True Range: the widest of the bar's own range and its distance from
 * the previous close.
 */

export interface OHLC {
  open: number;
  high: number;
  low: number;
  close: number;
}

export interface OHLCV extends OHLC {
  volume: number;
}

export function trueRange(high: number, low: number, prevClose: number): number {
  return Math.max(high - low, Math.abs(high - prevClose), Math.abs(low - prevClose));
}

/**
 * True range per bar, oldest first
 *
 * The first bar has no previous close and falls back to high - low.
 */
export function trueRangeSeries(bars: OHLC[]): number[] {
  return bars.map((bar, i) =>
    i === 0 ? bar.high - bar.low : trueRange(bar.high, bar.low, bars[i - 1].close)
  );
}
