import { describe, it, expect } from 'vitest';
import { createTimeframeConfig, TimeframeConfigBuilder } from '../config/timeframe-config';
import { adaptToTrend } from '../config/trend-adaptation';
import { TimeframeConfigError } from '../errors';

describe('createTimeframeConfig', () => {
  it('returns the defaults for a base timeframe', () => {
    const config = createTimeframeConfig('1h');

    expect(config.timeframe).toBe('1h');
    expect(config.pivotLeft).toBe(8);
    expect(config.lookbackCandles).toBe(120);
    expect(config.mergeRadiusPct).toBe(0.0025);
    expect(config.tfWeight).toBe(4);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('inherits from the nearest lower base timeframe', () => {
    expect(createTimeframeConfig('4h').tfWeight).toBe(4);
    expect(createTimeframeConfig('30m').tfWeight).toBe(3);
    expect(createTimeframeConfig('30m').timeframe).toBe('30m');
  });

  it('applies overrides and ignores undefined keys', () => {
    const config = createTimeframeConfig('5m', { pivotLeft: 6, tfWeight: undefined });

    expect(config.pivotLeft).toBe(6);
    expect(config.pivotRight).toBe(4);
    expect(config.tfWeight).toBe(2);
  });

  it('rejects out-of-range values instead of clamping', () => {
    expect(() => createTimeframeConfig('1m', { pivotLeft: 0 })).toThrow(TimeframeConfigError);
    expect(() => createTimeframeConfig('1m', { zoneBufferPct: 0.02 })).toThrow(TimeframeConfigError);
    expect(() => createTimeframeConfig('1m', { lookbackCandles: 600 })).toThrow(/lookbackCandles/);
  });

  it('requires atrMinMultiplier below atrMaxMultiplier', () => {
    expect(() => createTimeframeConfig('1m', { atrMinMultiplier: 2, atrMaxMultiplier: 1.5 })).toThrow(
      'atrMinMultiplier must be below atrMaxMultiplier'
    );
  });
});

describe('TimeframeConfigBuilder', () => {
  it('builds a validated config', () => {
    const config = new TimeframeConfigBuilder('15m').pivots(4).atrBand(0.5, 2.5).weight(6).build();

    expect(config.pivotLeft).toBe(4);
    expect(config.pivotRight).toBe(4);
    expect(config.atrMinMultiplier).toBe(0.5);
    expect(config.atrMaxMultiplier).toBe(2.5);
    expect(config.tfWeight).toBe(6);
    expect(config.lookbackCandles).toBe(100);
  });

  it('surfaces validation errors on build', () => {
    const builder = new TimeframeConfigBuilder('1m').sweep(0.05, 0.001);
    expect(() => builder.build()).toThrow(TimeframeConfigError);
  });
});

describe('adaptToTrend', () => {
  const config = createTimeframeConfig('1h');

  it('tightens parameters in a strong trend', () => {
    const adapted = adaptToTrend(config, { direction: 'bullish', strength: 'strong' });

    expect(adapted.pivotLeft).toBe(6);
    expect(adapted.pivotRight).toBe(6);
    expect(adapted.zoneBufferPct).toBeCloseTo(0.0016, 10);
    expect(adapted.minVolumePercentile).toBe(80);
    expect(Object.isFrozen(adapted)).toBe(true);
  });

  it('loosens parameters in a weak trend', () => {
    const adapted = adaptToTrend(config, { direction: 'bearish', strength: 'weak' });

    expect(adapted.pivotLeft).toBe(10);
    expect(adapted.zoneBufferPct).toBeCloseTo(0.0024, 10);
    expect(adapted.minVolumePercentile).toBe(70);
  });

  it('keeps pivots at least 1 and the percentile within (0, 100]', () => {
    const tight = createTimeframeConfig('1m', { pivotLeft: 1, pivotRight: 1, minVolumePercentile: 98 });
    const strong = adaptToTrend(tight, { direction: 'bullish', strength: 'strong' });
    expect(strong.pivotLeft).toBe(1);
    expect(strong.minVolumePercentile).toBe(100);

    const low = createTimeframeConfig('1m', { minVolumePercentile: 3 });
    expect(adaptToTrend(low, { direction: 'neutral', strength: 'weak' }).minVolumePercentile).toBe(1);
  });

  it('returns an equal copy without a decisive trend', () => {
    const moderate = adaptToTrend(config, { direction: 'bullish', strength: 'moderate' });
    const none = adaptToTrend(config);

    expect(moderate).toEqual(config);
    expect(none).toEqual(config);
    expect(none).not.toBe(config);
  });

  it('never mutates its input', () => {
    adaptToTrend(config, { direction: 'bullish', strength: 'strong' });
    expect(config.pivotLeft).toBe(8);
    expect(config.zoneBufferPct).toBe(0.002);
  });
});
