import { describe, it, expect } from 'vitest';
import { trueRange, trueRangeSeries, type OHLC } from '../core/true-range.js';
import { atr, atrLatest } from '../core/atr.js';

// TR after the first bar: 8, 8, 10, 6
const BARS: OHLC[] = [
  { open: 100, high: 105, low: 95, close: 102 },
  { open: 103, high: 108, low: 100, close: 106 },
  { open: 107, high: 112, low: 104, close: 110 },
  { open: 110, high: 111, low: 101, close: 103 },
  { open: 103, high: 104, low: 98, close: 100 },
];

describe('True Range', () => {
  describe('trueRange()', () => {
    it('uses high-low when that is largest', () => {
      expect(trueRange(110, 100, 105)).toBe(10);
    });

    it('uses |high-prevClose| on a gap up', () => {
      // H-L = 5, |H-PC| = 15, |L-PC| = 10
      expect(trueRange(115, 110, 100)).toBe(15);
    });

    it('uses |low-prevClose| on a gap down', () => {
      // H-L = 5, |H-PC| = 5, |L-PC| = 10
      expect(trueRange(105, 100, 110)).toBe(10);
    });
  });

  describe('trueRangeSeries()', () => {
    it('uses H-L for the first bar', () => {
      expect(trueRangeSeries(BARS)).toEqual([10, 8, 8, 10, 6]);
    });

    it('returns empty array for empty input', () => {
      expect(trueRangeSeries([])).toEqual([]);
    });
  });
});

describe('ATR (Average True Range)', () => {
  describe('atr()', () => {
    it('averages TR from the second bar onward', () => {
      // SMA(2) of [8, 8, 10, 6] = [8, 9, 8]
      expect(atr(BARS, 2)).toEqual([8, 9, 8]);
    });

    it('ignores the first bar high-low', () => {
      // (8 + 8 + 10 + 6) / 4 = 8, the first bar's 10 is not included
      expect(atr(BARS, 4)).toEqual([8]);
    });

    it('throws error for non-positive period', () => {
      expect(() => atr(BARS, 0)).toThrow('ATR period must be positive');
    });
  });

  describe('atrLatest()', () => {
    it('returns the mean of the last `period` true ranges', () => {
      // (10 + 6) / 2
      expect(atrLatest(BARS, 2)).toBe(8);
      // (8 + 10 + 6) / 3
      expect(atrLatest(BARS, 3)).toBe(8);
    });

    it('needs period + 1 bars', () => {
      expect(atrLatest(BARS, 4)).toBe(8);
      expect(atrLatest(BARS, 5)).toBeNull();
    });
  });
});
