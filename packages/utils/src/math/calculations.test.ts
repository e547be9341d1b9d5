import { describe, it, expect } from 'vitest';
import { sum, mean, relativeDistance, rangesOverlap } from './calculations';

describe('calculations', () => {
  it('sums and averages', () => {
    expect(sum([1, 2, 3, 4])).toBe(10);
    expect(mean([1, 2, 3, 4])).toBe(2.5);
    expect(mean([])).toBe(0);
  });

  it('measures relative distance', () => {
    expect(relativeDistance(101, 100)).toBeCloseTo(0.01, 12);
    expect(relativeDistance(99, 100)).toBeCloseTo(0.01, 12);
    expect(relativeDistance(5, 0)).toBe(Infinity);
  });

  it('detects overlapping price ranges, touching edges included', () => {
    expect(rangesOverlap(100, 101, 100.5, 102)).toBe(true);
    expect(rangesOverlap(100, 101, 101, 102)).toBe(true);
    expect(rangesOverlap(100, 101, 101.01, 102)).toBe(false);
  });
});
