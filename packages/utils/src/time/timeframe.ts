import type { Timeframe } from '@strata/schemas';

/**
 * Convert timeframe string to seconds
 *
 * @param timeframe - Timeframe string (e.g., '1m', '5m', '1h', '1d')
 * @returns Interval length in seconds
 */
export function timeframeToSeconds(timeframe: Timeframe): number {
  const unit = timeframe.slice(-1);
  const value = parseInt(timeframe.slice(0, -1), 10);

  switch (unit) {
    case 'm':
      return value * 60;
    case 'h':
      return value * 60 * 60;
    case 'd':
      return value * 24 * 60 * 60;
    default:
      throw new Error(`Invalid timeframe: ${timeframe}`);
  }
}

/**
 * Expected candle open times from `start` to `end`, both inclusive,
 * stepping by the timeframe interval from `start`
 *
 * @param start - First open time (unix seconds)
 * @param end - Last open time (unix seconds)
 * @param timeframe - Timeframe string
 */
export function getCandleTimestamps(
  start: number,
  end: number,
  timeframe: Timeframe
): number[] {
  const interval = timeframeToSeconds(timeframe);
  const timestamps: number[] = [];

  for (let ts = start; ts <= end; ts += interval) {
    timestamps.push(ts);
  }

  return timestamps;
}

/**
 * Format a unix-seconds timestamp for logs
 */
export function formatTimestamp(ts: number): string {
  return new Date(ts * 1000).toISOString();
}
