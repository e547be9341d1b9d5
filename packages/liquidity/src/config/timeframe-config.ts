import {
  TimeframeConfigSchema,
  type Timeframe,
  type TimeframeConfig,
  type TimeframeConfigOverrides,
} from '@strata/schemas';
import { TimeframeConfigError } from '../errors';
import { defaultsFor } from './defaults';

/**
 * Build a validated, frozen config for a timeframe
 *
 * Overrides are layered on the timeframe defaults. Keys set to undefined
 * keep the default. Out-of-range values throw TimeframeConfigError.
 */
export function createTimeframeConfig(
  timeframe: Timeframe,
  overrides: TimeframeConfigOverrides = {}
): TimeframeConfig {
  const merged: Record<string, unknown> = { ...defaultsFor(timeframe) };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) merged[key] = value;
  }
  merged.timeframe = timeframe;

  const parsed = TimeframeConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new TimeframeConfigError(timeframe, parsed.error.issues);
  }
  return Object.freeze(parsed.data);
}

/**
 * Fluent alternative to createTimeframeConfig
 *
 * @example
 * const config = new TimeframeConfigBuilder('15m')
 *   .pivots(4)
 *   .atrBand(0.5, 2.5)
 *   .build();
 */
export class TimeframeConfigBuilder {
  private readonly overrides: TimeframeConfigOverrides = {};

  constructor(private readonly timeframe: Timeframe) {}

  set<K extends keyof TimeframeConfigOverrides>(key: K, value: TimeframeConfigOverrides[K]): this {
    this.overrides[key] = value;
    return this;
  }

  pivots(left: number, right: number = left): this {
    return this.set('pivotLeft', left).set('pivotRight', right);
  }

  lookback(candles: number): this {
    return this.set('lookbackCandles', candles);
  }

  maxZoneAge(candles: number): this {
    return this.set('maxZoneAgeCandles', candles);
  }

  volume(percentile: number, spikeMultiplier?: number): this {
    this.set('minVolumePercentile', percentile);
    return spikeMultiplier === undefined ? this : this.set('volumeSpikeMultiplier', spikeMultiplier);
  }

  zoneBuffer(pct: number): this {
    return this.set('zoneBufferPct', pct);
  }

  mergeRadius(pct: number): this {
    return this.set('mergeRadiusPct', pct);
  }

  minZoneDistance(pct: number): this {
    return this.set('minZoneDistancePct', pct);
  }

  atrBand(min: number, max: number): this {
    return this.set('atrMinMultiplier', min).set('atrMaxMultiplier', max);
  }

  atrPeriod(period: number): this {
    return this.set('atrPeriod', period);
  }

  sweep(penetrationPct: number, rejectionPct: number): this {
    return this.set('sweepPenetrationPct', penetrationPct).set('sweepRejectionPct', rejectionPct);
  }

  weight(tfWeight: number): this {
    return this.set('tfWeight', tfWeight);
  }

  build(): TimeframeConfig {
    return createTimeframeConfig(this.timeframe, this.overrides);
  }
}
