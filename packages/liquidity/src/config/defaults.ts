import type { Timeframe, TimeframeConfig } from '@strata/schemas';

type ConfigDefaults = Omit<TimeframeConfig, 'timeframe'>;

/**
 * Tuned defaults for the base timeframes. Faster timeframes use tighter
 * pivots, buffers and age limits and carry less confluence weight.
 */
export const TIMEFRAME_DEFAULTS = {
  '1m': {
    pivotLeft: 3,
    pivotRight: 3,
    lookbackCandles: 80,
    maxZoneAgeCandles: 40,
    minVolumePercentile: 65,
    volumeSpikeMultiplier: 1.5,
    zoneBufferPct: 0.0008,
    mergeRadiusPct: 0.0012,
    minZoneDistancePct: 0.0005,
    atrMinMultiplier: 0.5,
    atrMaxMultiplier: 1.5,
    sweepPenetrationPct: 0.0006,
    sweepRejectionPct: 0.0005,
    tfWeight: 1,
    atrPeriod: 14,
  },
  '5m': {
    pivotLeft: 4,
    pivotRight: 4,
    lookbackCandles: 100,
    maxZoneAgeCandles: 100,
    minVolumePercentile: 70,
    volumeSpikeMultiplier: 1.6,
    zoneBufferPct: 0.001,
    mergeRadiusPct: 0.0015,
    minZoneDistancePct: 0.0008,
    atrMinMultiplier: 0.6,
    atrMaxMultiplier: 1.8,
    sweepPenetrationPct: 0.0008,
    sweepRejectionPct: 0.0006,
    tfWeight: 2,
    atrPeriod: 14,
  },
  '15m': {
    pivotLeft: 5,
    pivotRight: 5,
    lookbackCandles: 100,
    maxZoneAgeCandles: 150,
    minVolumePercentile: 70,
    volumeSpikeMultiplier: 1.8,
    zoneBufferPct: 0.0015,
    mergeRadiusPct: 0.0018,
    minZoneDistancePct: 0.001,
    atrMinMultiplier: 0.7,
    atrMaxMultiplier: 2.0,
    sweepPenetrationPct: 0.0012,
    sweepRejectionPct: 0.0008,
    tfWeight: 3,
    atrPeriod: 14,
  },
  '1h': {
    pivotLeft: 8,
    pivotRight: 8,
    lookbackCandles: 120,
    maxZoneAgeCandles: 200,
    minVolumePercentile: 75,
    volumeSpikeMultiplier: 2.2,
    zoneBufferPct: 0.002,
    mergeRadiusPct: 0.0025,
    minZoneDistancePct: 0.0015,
    atrMinMultiplier: 0.8,
    atrMaxMultiplier: 2.5,
    sweepPenetrationPct: 0.002,
    sweepRejectionPct: 0.0012,
    tfWeight: 4,
    atrPeriod: 14,
  },
} satisfies Partial<Record<Timeframe, ConfigDefaults>>;

type BaseTimeframe = keyof typeof TIMEFRAME_DEFAULTS;

/**
 * Timeframes without their own table entry inherit from the nearest
 * lower base timeframe.
 */
const INHERITS_FROM: Record<Timeframe, BaseTimeframe> = {
  '1m': '1m',
  '5m': '5m',
  '15m': '15m',
  '30m': '15m',
  '1h': '1h',
  '2h': '1h',
  '4h': '1h',
  '6h': '1h',
  '1d': '1h',
};

/**
 * Default tunables for a timeframe (a fresh copy)
 */
export function defaultsFor(timeframe: Timeframe): ConfigDefaults {
  return { ...TIMEFRAME_DEFAULTS[INHERITS_FROM[timeframe]] };
}
