/**
 * Volume profile clustering
 *
 * Bins each bar's typical price into equal-width price
 * bins and returns the bins whose accumulated volume is at or above the
 * requested percentile of all bin volumes.
 */

import type { OHLCV } from '../core/true-range.js';
import { percentile } from '../core/percentile.js';

export interface VolumeCluster {
  /** Bin centre */
  price: number;
  volume: number;
}

export interface VolumeProfileOptions {
  /** Number of price bins (default: 50) */
  bins?: number;
  /** Minimum bin-volume percentile in [0, 100] */
  percentile: number;
}

/** (h + l + c) / 3, the per-bar VWAP proxy */
export function typicalPrice(bar: Pick<OHLCV, 'high' | 'low' | 'close'>): number {
  return (bar.high + bar.low + bar.close) / 3;
}

/**
 * @returns Clusters ordered by price ascending; empty for empty input
 */
export function volumeProfileClusters(
  bars: Pick<OHLCV, 'high' | 'low' | 'close' | 'volume'>[],
  options: VolumeProfileOptions
): VolumeCluster[] {
  const binCount = options.bins ?? 50;
  if (binCount < 1) {
    throw new Error('Volume profile needs at least one bin');
  }
  if (bars.length === 0) {
    return [];
  }

  const prices = bars.map(typicalPrice);
  const min = Math.min(...prices);
  const max = Math.max(...prices);

  // Flat series: everything lands in a single node
  if (max === min) {
    let total = 0;
    for (const b of bars) total += b.volume;
    return [{ price: min, volume: total }];
  }

  const width = (max - min) / binCount;
  const volumes = new Array<number>(binCount).fill(0);

  for (let i = 0; i < bars.length; i++) {
    // The max price falls on the upper edge; keep it in the last bin
    const idx = Math.min(Math.floor((prices[i] - min) / width), binCount - 1);
    volumes[idx] += bars[i].volume;
  }

  const threshold = percentile(volumes, options.percentile);

  const clusters: VolumeCluster[] = [];
  for (let i = 0; i < binCount; i++) {
    if (volumes[i] > 0 && volumes[i] >= threshold) {
      clusters.push({ price: min + width * (i + 0.5), volume: volumes[i] });
    }
  }
  return clusters;
}
