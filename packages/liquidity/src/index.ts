/**
 * @strata/liquidity
 *
 * Multi-timeframe liquidity zones: per-timeframe config, pattern plugins,
 * zone set maintenance and cross-timeframe confluence.
 */

// Errors
export * from './errors';

// Configuration
export { TIMEFRAME_DEFAULTS, defaultsFor } from './config/defaults';
export { createTimeframeConfig, TimeframeConfigBuilder } from './config/timeframe-config';
export { adaptToTrend } from './config/trend-adaptation';

// Zones
export { createZone, zoneMidpoint, type ZoneCandidate } from './zones/zone';
export * from './zones/zone-set';
export { detectZoneCandidates } from './zones/zone-detector';
export { findConfluence, type ConfluenceGroup } from './confluence/confluence';

// Plugins
export * from './plugins';

// Map
export { LiquidityMap } from './map/liquidity-map';
export type * from './map/types';
