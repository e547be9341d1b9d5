import { describe, it, expect } from 'vitest';
import { findMissingTimestamps, groupGapRanges } from '../backfill/gap-detector';
import { BASE_TS, makeCandle } from './fixtures';

describe('findMissingTimestamps()', () => {
  it('lists expected open times with no candle', () => {
    const candles = [makeCandle(1000), makeCandle(1120)];
    expect(findMissingTimestamps(candles, '1m', 1000, 1240)).toEqual([1060, 1180, 1240]);
  });

  it('returns empty for a complete range', () => {
    const candles = [0, 1, 2].map((i) => makeCandle(BASE_TS + i * 300, { timeframe: '5m' }));
    expect(findMissingTimestamps(candles, '5m', BASE_TS, BASE_TS + 600)).toEqual([]);
  });
});

describe('groupGapRanges()', () => {
  it('collapses consecutive open times into inclusive ranges', () => {
    expect(groupGapRanges([1060, 1120, 1240], '1m')).toEqual([
      { start: 1060, end: 1120, missing: 2 },
      { start: 1240, end: 1240, missing: 1 },
    ]);
  });

  it('returns empty for no missing candles', () => {
    expect(groupGapRanges([], '1m')).toEqual([]);
  });
});
