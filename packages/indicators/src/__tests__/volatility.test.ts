import { describe, it, expect } from 'vitest';
import type { OHLC } from '../core/true-range.js';
import { classifyVolatility } from '../volatility/volatility.js';

/** Bar centred on 100 whose true range equals `range` */
const bar = (range: number): OHLC => ({
  open: 100,
  high: 100 + range / 2,
  low: 100 - range / 2,
  close: 100,
});

const series = (head: number, tail: number): OHLC[] => [
  ...Array.from({ length: 7 }, () => bar(head)),
  ...Array.from({ length: 3 }, () => bar(tail)),
];

const CONFIG = { period: 3, lowMultiplier: 0.7, highMultiplier: 1.5 };

describe('classifyVolatility()', () => {
  it('reports low when current ATR falls below the low multiple', () => {
    // current = 1, baseline = 2, 1 < 1.4
    expect(classifyVolatility(series(2, 1), CONFIG)).toEqual({
      current: 1,
      baseline: 2,
      state: 'low',
    });
  });

  it('reports high when current ATR exceeds the high multiple', () => {
    // current = 4, baseline = 2, 4 > 3
    expect(classifyVolatility(series(2, 4), CONFIG)?.state).toBe('high');
  });

  it('reports normal for a steady range', () => {
    expect(classifyVolatility(series(2, 2), CONFIG)).toEqual({
      current: 2,
      baseline: 2,
      state: 'normal',
    });
  });

  it('returns null without enough history for a baseline', () => {
    // 6 bars leave 3 for the baseline, which needs 4
    const bars = Array.from({ length: 6 }, () => bar(2));
    expect(classifyVolatility(bars, CONFIG)).toBeNull();
  });
});
