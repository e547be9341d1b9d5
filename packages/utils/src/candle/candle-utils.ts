/**
 * Candle series helpers shared by the fetch, cache and sync layers
 */

import type { Candle } from '@strata/schemas';

/**
 * Sort candles ascending by open time and keep the last copy of each openTs
 *
 * Later entries win so that a re-delivered (updated) candle replaces the
 * earlier version of the same interval.
 *
 * @param candles - Candles in any order, possibly with repeats
 * @returns New ascending array with unique open times
 */
export function normalizeCandles(candles: Candle[]): Candle[] {
  const byOpenTs = new Map<number, Candle>();
  for (const candle of candles) {
    byOpenTs.set(candle.openTs, candle);
  }
  return [...byOpenTs.values()].sort((a, b) => a.openTs - b.openTs);
}

/**
 * Insert or replace a candle in an ascending series (returns a new array)
 */
export function upsertCandle(series: Candle[], candle: Candle): Candle[] {
  const result = [...series];
  let lo = 0;
  let hi = result.length;

  // Binary search for insertion point
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (result[mid].openTs < candle.openTs) lo = mid + 1;
    else hi = mid;
  }

  if (lo < result.length && result[lo].openTs === candle.openTs) {
    result[lo] = candle;
  } else {
    result.splice(lo, 0, candle);
  }
  return result;
}
