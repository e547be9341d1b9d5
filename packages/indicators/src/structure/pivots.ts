/**
 * Swing pivot detection
 *
 * A pivot high at i requires high[i] to be strictly greater than every
 * high in the `left` bars before it and the `right` bars after it (lows
 * mirror this). Bars without a full right window are never pivots, so
 * every returned pivot is confirmed.
 */

export interface PivotBar {
  high: number;
  low: number;
}

export interface Pivot {
  /** Index into the input array */
  index: number;
  price: number;
}

export interface PivotResult {
  highs: Pivot[];
  lows: Pivot[];
}

function isPivotHigh(bars: PivotBar[], i: number, left: number, right: number): boolean {
  const price = bars[i].high;
  for (let j = i - left; j <= i + right; j++) {
    if (j !== i && bars[j].high >= price) return false;
  }
  return true;
}

function isPivotLow(bars: PivotBar[], i: number, left: number, right: number): boolean {
  const price = bars[i].low;
  for (let j = i - left; j <= i + right; j++) {
    if (j !== i && bars[j].low <= price) return false;
  }
  return true;
}

/**
 * Detect confirmed swing highs and lows
 * @param bars - Bars (oldest first)
 * @param left - Bars required before the pivot
 * @param right - Bars required after the pivot
 */
export function detectPivots(bars: PivotBar[], left: number, right: number): PivotResult {
  if (left < 1 || right < 1) {
    throw new Error('Pivot windows must be at least 1');
  }

  const highs: Pivot[] = [];
  const lows: Pivot[] = [];

  for (let i = left; i < bars.length - right; i++) {
    if (isPivotHigh(bars, i, left, right)) {
      highs.push({ index: i, price: bars[i].high });
    }
    if (isPivotLow(bars, i, left, right)) {
      lows.push({ index: i, price: bars[i].low });
    }
  }

  return { highs, lows };
}
