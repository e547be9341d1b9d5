/**
 * @strata/indicators
 *
 * Stateless indicator helpers shared by the sync and liquidity layers.
 */

// Core functions
export { sma, smaLatest } from './core/sma.js';
export { trueRange, trueRangeSeries, type OHLC, type OHLCV } from './core/true-range.js';
export { atr, atrLatest } from './core/atr.js';
export { percentile } from './core/percentile.js';

// Volatility
export {
  classifyVolatility,
  type VolatilityConfig,
  type VolatilityReading,
  type VolatilityState,
} from './volatility/volatility.js';

// Volume
export { volumeAverage, volumeSpikeRatio } from './volume/volume.js';
export {
  typicalPrice,
  volumeProfileClusters,
  type VolumeCluster,
  type VolumeProfileOptions,
} from './volume/volume-profile.js';

// Structure
export { detectPivots, type Pivot, type PivotBar, type PivotResult } from './structure/pivots.js';
