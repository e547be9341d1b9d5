import { describe, it, expect } from 'vitest';
import { detectPivots } from '../structure/pivots.js';

const bars = (rows: Array<[number, number]>) => rows.map(([high, low]) => ({ high, low }));

describe('detectPivots()', () => {
  it('finds confirmed highs and lows', () => {
    const result = detectPivots(
      bars([
        [10, 8],
        [11, 7],
        [14, 9],
        [12, 5],
        [11, 6],
        [13, 7],
        [12, 8],
      ]),
      2,
      2
    );

    expect(result.highs).toEqual([{ index: 2, price: 14 }]);
    expect(result.lows).toEqual([{ index: 3, price: 5 }]);
  });

  it('rejects equal highs and lows', () => {
    const result = detectPivots(
      bars([
        [10, 9],
        [12, 11],
        [12, 11],
        [10, 9],
        [9, 8],
      ]),
      1,
      1
    );

    expect(result).toEqual({ highs: [], lows: [] });
  });

  it('does not report a bar without a full right window', () => {
    const result = detectPivots(
      bars([
        [10, 9],
        [11, 10],
        [12, 11],
      ]),
      1,
      1
    );

    expect(result.highs).toEqual([]);
  });

  it('throws for a window below 1', () => {
    expect(() => detectPivots([], 0, 2)).toThrow('Pivot windows must be at least 1');
  });
});
