/**
 * Simple Moving Average (SMA)
 */

function assertPeriod(period: number): void {
  if (period <= 0) {
    throw new Error('SMA period must be positive');
  }
}

/**
 * Rolling mean over `period` values
 * @returns One value per full window (length = values.length - period + 1)
 */
export function sma(values: number[], period: number): number[] {
  assertPeriod(period);

  const result: number[] = [];
  let windowSum = 0;
  values.forEach((value, i) => {
    windowSum += value;
    if (i >= period) windowSum -= values[i - period];
    if (i >= period - 1) result.push(windowSum / period);
  });
  return result;
}

/**
 * Mean of the trailing `period` values, or null if there are fewer
 */
export function smaLatest(values: number[], period: number): number | null {
  assertPeriod(period);
  if (values.length < period) return null;

  const tail = values.slice(-period);
  return tail.reduce((total, value) => total + value, 0) / period;
}
