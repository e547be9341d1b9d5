/**
 * Volume helpers
 */

/**
 * Mean of the trailing `period` volumes
 *
 * Uses whatever is available when fewer than `period` values exist.
 *
 * @returns Average, or null for an empty series
 */
export function volumeAverage(volumes: number[], period: number): number | null {
  if (period <= 0) {
    throw new Error('Volume period must be positive');
  }
  if (volumes.length === 0) {
    return null;
  }

  const window = volumes.slice(-period);
  let total = 0;
  for (const v of window) {
    total += v;
  }
  return total / window.length;
}

/**
 * Ratio of `current` to the trailing volume average
 *
 * @param trailing - Volumes preceding the candle under test (oldest first)
 * @param current - Volume of the candle under test
 * @param lookback - Trailing window size (default: 20)
 * @returns Ratio (2.0 = twice the average), or null when there is no
 *          trailing data or its average is zero
 */
export function volumeSpikeRatio(
  trailing: number[],
  current: number,
  lookback: number = 20
): number | null {
  const avg = volumeAverage(trailing, lookback);
  if (avg === null || avg === 0) {
    return null;
  }
  return current / avg;
}
