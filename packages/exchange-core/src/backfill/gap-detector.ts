import type { Candle, GapRange, Timeframe } from '@strata/schemas';
import { getCandleTimestamps, timeframeToSeconds } from '@strata/utils';

/**
 * List expected open times in `[startTs, endTs]` that no candle covers
 *
 * @param candles - Candles in any order
 * @param timeframe - Timeframe for interval calculation
 * @param startTs - First expected open time (inclusive)
 * @param endTs - Last expected open time (inclusive)
 * @returns Missing open times, ascending
 */
export function findMissingTimestamps(
  candles: Pick<Candle, 'openTs'>[],
  timeframe: Timeframe,
  startTs: number,
  endTs: number
): number[] {
  const present = new Set(candles.map((c) => c.openTs));
  return getCandleTimestamps(startTs, endTs, timeframe).filter((ts) => !present.has(ts));
}

/**
 * Collapse ascending missing open times into contiguous gap ranges
 */
export function groupGapRanges(missing: number[], timeframe: Timeframe): GapRange[] {
  const interval = timeframeToSeconds(timeframe);
  const ranges: GapRange[] = [];

  let current: GapRange | null = null;
  for (const ts of missing) {
    if (current !== null && ts === current.end + interval) {
      current.end = ts;
      current.missing++;
    } else {
      current = { start: ts, end: ts, missing: 1 };
      ranges.push(current);
    }
  }

  return ranges;
}
