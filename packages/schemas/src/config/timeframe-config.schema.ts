import { z } from 'zod';
import { TimeframeSchema } from '../market/candle.schema';

/**
 * Per-timeframe tunables for the liquidity engine.
 *
 * Ranges are enforced at construction; out-of-range values are rejected,
 * never clamped.
 */
export const TimeframeConfigSchema = z
  .object({
    timeframe: TimeframeSchema,
    /** Candles left of a pivot that must be strictly lower/higher */
    pivotLeft: z.number().int().min(1).max(20),
    /** Candles right of a pivot required for confirmation */
    pivotRight: z.number().int().min(1).max(20),
    /** Candle window analysed per refresh */
    lookbackCandles: z.number().int().min(10).max(500),
    /** Zones older than this many candles are aged out */
    maxZoneAgeCandles: z.number().int().min(10).max(1000),
    /** Volume profile bins at or above this percentile count as clusters */
    minVolumePercentile: z.number().gt(0).max(100),
    /** Originating candle volume / trailing average required for a new zone */
    volumeSpikeMultiplier: z.number().min(1).max(5),
    /** Half-width of a pivot zone as a fraction of the pivot price */
    zoneBufferPct: z.number().gt(0).max(0.01),
    /** Proximity (fraction of price) within which zones merge / group */
    mergeRadiusPct: z.number().gt(0).max(0.01),
    /** New zones closer than this fraction of price are dropped */
    minZoneDistancePct: z.number().min(0).max(0.01),
    /** Skip detection when ATR < atrMinMultiplier x baseline */
    atrMinMultiplier: z.number().min(0.1).max(2),
    /** Skip detection when ATR > atrMaxMultiplier x baseline */
    atrMaxMultiplier: z.number().min(0.5).max(5),
    /** Penetration beyond a liquidity level that counts as a sweep */
    sweepPenetrationPct: z.number().min(0.0001).max(0.01),
    /** Reversal away from a swept level that confirms the sweep */
    sweepRejectionPct: z.number().min(0.0001).max(0.01),
    /** Contribution of this timeframe to confluence weight */
    tfWeight: z.number().int().min(1).max(10),
    /** ATR lookback period */
    atrPeriod: z.number().int().min(2).max(100),
  })
  .refine((config) => config.atrMinMultiplier < config.atrMaxMultiplier, {
    message: 'atrMinMultiplier must be below atrMaxMultiplier',
    path: ['atrMinMultiplier'],
  });

export type TimeframeConfig = z.infer<typeof TimeframeConfigSchema>;

/**
 * Overridable fields (timeframe is fixed by the factory)
 */
export type TimeframeConfigOverrides = Partial<Omit<TimeframeConfig, 'timeframe'>>;
