/**
 * Volatility classification
 *
 * Compares the current ATR against a baseline ATR taken over the same
 * series with the most recent `period` bars removed.
 */

import type { OHLC } from '../core/true-range.js';
import { atrLatest } from '../core/atr.js';

export type VolatilityState = 'low' | 'normal' | 'high';

export interface VolatilityConfig {
  /** ATR period */
  period: number;
  /** current < baseline × lowMultiplier → low */
  lowMultiplier: number;
  /** current > baseline × highMultiplier → high */
  highMultiplier: number;
}

export interface VolatilityReading {
  current: number;
  baseline: number;
  state: VolatilityState;
}

/**
 * Classify the volatility of the latest bars against their own history
 *
 * @returns Reading, or null when either ATR cannot be computed
 *          (fewer than `2 × period + 1` bars) or the baseline is zero
 */
export function classifyVolatility(
  bars: OHLC[],
  config: VolatilityConfig
): VolatilityReading | null {
  const { period, lowMultiplier, highMultiplier } = config;

  const current = atrLatest(bars, period);
  const baseline = atrLatest(bars.slice(0, bars.length - period), period);

  if (current === null || baseline === null || baseline === 0) {
    return null;
  }

  let state: VolatilityState = 'normal';
  if (current < baseline * lowMultiplier) {
    state = 'low';
  } else if (current > baseline * highMultiplier) {
    state = 'high';
  }

  return { current, baseline, state };
}
