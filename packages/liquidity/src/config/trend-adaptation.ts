import type { TimeframeConfig, TrendState } from '@strata/schemas';

/**
 * Tune detection parameters to the prevailing trend
 *
 * Strong trends get tighter pivots and buffers with a stricter volume
 * percentile; weak trends the opposite. The result is a new frozen object;
 * the input is never mutated and the result is not re-validated.
 */
export function adaptToTrend(config: TimeframeConfig, trend?: TrendState): TimeframeConfig {
  switch (trend?.strength) {
    case 'strong':
      return Object.freeze({
        ...config,
        pivotLeft: Math.max(1, Math.round(config.pivotLeft * 0.7)),
        pivotRight: Math.max(1, Math.round(config.pivotRight * 0.7)),
        zoneBufferPct: config.zoneBufferPct * 0.8,
        minVolumePercentile: Math.min(100, config.minVolumePercentile + 5),
      });
    case 'weak':
      return Object.freeze({
        ...config,
        pivotLeft: Math.max(1, Math.round(config.pivotLeft * 1.2)),
        pivotRight: Math.max(1, Math.round(config.pivotRight * 1.2)),
        zoneBufferPct: config.zoneBufferPct * 1.2,
        // percentile must stay in (0, 100]
        minVolumePercentile: Math.max(1, config.minVolumePercentile - 5),
      });
    default:
      return Object.freeze({ ...config });
  }
}
