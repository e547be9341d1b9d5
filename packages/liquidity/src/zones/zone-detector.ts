import type { Candle, LiquidityZone, TimeframeConfig } from '@strata/schemas';
import { detectPivots, volumeProfileClusters, type VolumeCluster } from '@strata/indicators';
import { createZone } from './zone';

/** Clusters within this fraction of a pivot price back it with volume */
const CLUSTER_PROXIMITY = 0.005;

function volumeNear(clusters: VolumeCluster[], price: number): number {
  let total = 0;
  for (const cluster of clusters) {
    if (Math.abs(cluster.price - price) / price < CLUSTER_PROXIMITY) total += cluster.volume;
  }
  return total;
}

/**
 * Support/resistance candidates from volume-backed pivots
 *
 * Pivot highs become resistance and pivot lows support when a
 * volume-profile cluster lies near the pivot price. Ids derive from the
 * pivot candle so re-detecting the same pivot yields the same id.
 */
export function detectZoneCandidates(
  symbol: string,
  candles: Candle[],
  config: TimeframeConfig
): LiquidityZone[] {
  const { timeframe, pivotLeft, pivotRight, zoneBufferPct, minVolumePercentile } = config;
  const pivots = detectPivots(candles, pivotLeft, pivotRight);
  const clusters = volumeProfileClusters(candles, { percentile: minVolumePercentile });
  const zones: LiquidityZone[] = [];

  for (const pivot of pivots.highs) {
    const volume = volumeNear(clusters, pivot.price);
    if (volume <= 0) continue;
    const createdTs = candles[pivot.index].openTs;
    zones.push(
      createZone({
        id: `${symbol}_${timeframe}_R_${createdTs}`,
        symbol,
        timeframe,
        kind: 'resistance',
        bias: 'bearish',
        priceLow: pivot.price * (1 - zoneBufferPct),
        priceHigh: pivot.price * (1 + zoneBufferPct),
        createdTs,
        volume,
      })
    );
  }

  for (const pivot of pivots.lows) {
    const volume = volumeNear(clusters, pivot.price);
    if (volume <= 0) continue;
    const createdTs = candles[pivot.index].openTs;
    zones.push(
      createZone({
        id: `${symbol}_${timeframe}_S_${createdTs}`,
        symbol,
        timeframe,
        kind: 'support',
        bias: 'bullish',
        priceLow: pivot.price * (1 - zoneBufferPct),
        priceHigh: pivot.price * (1 + zoneBufferPct),
        createdTs,
        volume,
      })
    );
  }

  return zones;
}
