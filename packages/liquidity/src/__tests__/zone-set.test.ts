import { describe, it, expect } from 'vitest';
import { createZone } from '../zones/zone';
import { ageFilter, assignPdPosition, mergeZones, recalculateStrength, refreshTouches } from '../zones/zone-set';
import { ZoneValidationError } from '../errors';
import { bar, zone } from './fixtures';

describe('createZone', () => {
  it('fills initial state', () => {
    const z = zone({ id: 'z1', priceLow: 100, priceHigh: 101 });

    expect(z.strength).toBe('weak');
    expect(z.touchCount).toBe(0);
    expect(z.isMitigated).toBe(false);
    expect(z.confluenceWeight).toBe(0);
    expect(z.lastTouchTs).toBeNull();
    expect(z.pdPosition).toBe('equilibrium');
  });

  it('rejects an inverted range', () => {
    expect(() =>
      createZone({
        id: 'bad',
        symbol: 'BTCUSDT',
        timeframe: '1m',
        kind: 'support',
        bias: 'bullish',
        priceLow: 102,
        priceHigh: 101,
        createdTs: 0,
      })
    ).toThrow(ZoneValidationError);
  });
});

describe('ageFilter', () => {
  it('removes zones older than the limit in candles', () => {
    // 5m interval: 300s. nowTs 30000 -> ages of 100 and 50 candles
    const old = zone({ id: 'old', priceLow: 100, priceHigh: 101, createdTs: 0 });
    const edge = zone({ id: 'edge', priceLow: 100, priceHigh: 101, createdTs: 15000 });

    const { kept, removed } = ageFilter([old, edge], 30000, '5m', 50);

    expect(kept.map((z) => z.id)).toEqual(['edge']);
    expect(removed.map((z) => z.id)).toEqual(['old']);
  });
});

describe('mergeZones', () => {
  const a = zone({ id: 'a', priceLow: 100, priceHigh: 101 });
  const b = zone({ id: 'b', priceLow: 110, priceHigh: 111 });

  it('returns an equal set for no candidates', () => {
    const result = mergeZones([a, b], [], 0.001);

    expect(result.zones).toEqual([a, b]);
    expect(result.added).toBe(0);
    expect(result.merged).toBe(0);
  });

  it('is idempotent when re-merging known ids', () => {
    const first = mergeZones([a], [b], 0.001);
    const second = mergeZones(first.zones, [b], 0.001);

    expect(second.zones).toEqual(first.zones);
    expect(second.added).toBe(0);
    expect(second.merged).toBe(0);
  });

  it('keeps the stronger zone and bumps its touch count', () => {
    const candidate = zone({ id: 'c', priceLow: 101.05, priceHigh: 102, strength: 'moderate' });

    const result = mergeZones([a], [candidate], 0.001);

    expect(result.merged).toBe(1);
    expect(result.zones).toHaveLength(1);
    expect(result.zones[0].id).toBe('c');
    expect(result.zones[0].touchCount).toBe(1);
  });

  it('lets the existing zone win ties', () => {
    const candidate = zone({ id: 'c', priceLow: 100.5, priceHigh: 101.5, touchCount: 2 });
    const existing = zone({ id: 'e', priceLow: 100, priceHigh: 101, touchCount: 2 });

    const result = mergeZones([existing], [candidate], 0.001);

    expect(result.zones[0].id).toBe('e');
    expect(result.zones[0].touchCount).toBe(3);
  });

  it('never merges across biases', () => {
    const bearish = zone({ id: 'r', kind: 'resistance', bias: 'bearish', priceLow: 100, priceHigh: 101 });

    const result = mergeZones([a], [bearish], 0.001);

    expect(result.added).toBe(1);
    expect(result.zones.map((z) => z.id)).toEqual(['a', 'r']);
  });

  it('skips an overlapping zone of the other bias and merges into the matching one', () => {
    const bearish = zone({ id: 'r', kind: 'resistance', bias: 'bearish', priceLow: 100, priceHigh: 101 });
    const bullish = zone({ id: 's', priceLow: 100.2, priceHigh: 101.2 });
    const candidate = zone({ id: 'c', priceLow: 100.4, priceHigh: 101 });

    const result = mergeZones([bearish, bullish], [candidate], 0.001);

    expect(result.merged).toBe(1);
    expect(result.added).toBe(0);
    expect(result.zones.map((z) => [z.id, z.touchCount])).toEqual([
      ['r', 0],
      ['s', 1],
    ]);
  });

  it('does not mutate its inputs', () => {
    const existing = [zone({ id: 'e', priceLow: 100, priceHigh: 101 })];
    mergeZones(existing, [zone({ id: 'c', priceLow: 100, priceHigh: 101 })], 0.001);
    expect(existing[0].touchCount).toBe(0);
  });
});

describe('refreshTouches', () => {
  const support = zone({ id: 's', priceLow: 100, priceHigh: 101, createdTs: 0 });
  const candles = [
    bar(1, { open: 101.2, high: 102, low: 100.5, close: 101.5 }),
    bar(2, { open: 102, high: 103, low: 101.5, close: 102.5 }),
    bar(3, { open: 100.2, high: 100.5, low: 99, close: 99.5 }),
  ];

  it('counts wick touches and marks a close-through as mitigated', () => {
    const [updated] = refreshTouches([support], candles);

    expect(updated.touchCount).toBe(2);
    expect(updated.lastTouchTs).toBe(candles[2].openTs);
    expect(updated.isMitigated).toBe(true);
  });

  it('counts each candle once', () => {
    const once = refreshTouches([support], candles.slice(0, 1));
    const twice = refreshTouches(once, candles.slice(0, 1));

    expect(twice[0].touchCount).toBe(1);
    expect(support.touchCount).toBe(0);
  });

  it('counts a candle whose range engulfs the zone', () => {
    const engulfing = bar(1, { open: 101.2, high: 101.3, low: 99.8, close: 100.6 });

    const [updated] = refreshTouches([support], [engulfing]);

    expect(updated.touchCount).toBe(1);
    expect(updated.lastTouchTs).toBe(engulfing.openTs);
    expect(updated.isMitigated).toBe(false);
  });

  it('ignores candles that opened before the zone formed', () => {
    const late = zone({ id: 'late', priceLow: 100, priceHigh: 101, createdTs: candles[2].openTs });
    expect(refreshTouches([late], candles)[0].touchCount).toBe(0);
  });
});

describe('recalculateStrength', () => {
  it('ranks support/resistance by touches and the 70th-percentile volume', () => {
    // volumes 10..50 -> threshold sorted[floor(5 * 0.7)] = 40
    const zones = [
      zone({ id: 'strong', priceLow: 1, priceHigh: 2, touchCount: 3, volume: 50 }),
      zone({ id: 'touched', priceLow: 1, priceHigh: 2, touchCount: 3, volume: 30 }),
      zone({ id: 'half', priceLow: 1, priceHigh: 2, touchCount: 0, volume: 20 }),
      zone({ id: 'weak', priceLow: 1, priceHigh: 2, touchCount: 0, volume: 10 }),
      zone({ id: 'volume', priceLow: 1, priceHigh: 2, touchCount: 1, volume: 40 }),
      zone({ id: 'ob', kind: 'order-block', priceLow: 1, priceHigh: 2, strength: 'strong', volume: 1 }),
    ];

    const strength = Object.fromEntries(recalculateStrength(zones).map((z) => [z.id, z.strength]));

    expect(strength).toEqual({
      strong: 'strong',
      touched: 'moderate',
      half: 'moderate',
      weak: 'weak',
      volume: 'moderate',
      ob: 'strong',
    });
  });
});

describe('assignPdPosition', () => {
  it('places zones in the premium/discount range', () => {
    const range = [
      bar(0, { open: 150, high: 200, low: 140, close: 150 }),
      bar(1, { open: 150, high: 160, low: 100, close: 150 }),
    ];
    const at = (id: string, mid: number) => zone({ id, priceLow: mid - 1, priceHigh: mid + 1 });

    const result = assignPdPosition([at('p', 190), at('e', 150), at('d', 110), at('e2', 154), at('p2', 156)], range);

    expect(result.map((z) => z.pdPosition)).toEqual(['premium', 'equilibrium', 'discount', 'equilibrium', 'premium']);
  });

  it('treats a zero range as equilibrium', () => {
    const flat = [bar(0, { open: 100, high: 100, low: 100, close: 100 })];
    const [z] = assignPdPosition([zone({ id: 'z', priceLow: 150, priceHigh: 151 })], flat);
    expect(z.pdPosition).toBe('equilibrium');
  });
});
