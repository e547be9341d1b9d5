import type { Timeframe, TimeframeConfigOverrides } from '@strata/schemas';
import type { Logger } from '@strata/utils';
import type { PluginName } from '../plugins/types';

export type RefreshSkipReason = 'unknown-timeframe' | 'insufficient-candles' | 'volatility';

/**
 * Outcome of one onCandleClose call
 *
 * A volatility skip still ages, updates and re-scores existing zones;
 * only detection is skipped.
 */
export interface RefreshReport {
  timeframe: Timeframe;
  refreshed: boolean;
  skippedReason?: RefreshSkipReason;
  created: number;
  merged: number;
  removedByAge: number;
  /** Candidates dropped by the volume-spike and distance filters */
  filtered: {
    volume: number;
    distance: number;
  };
}

export interface FilterCounters {
  atr: number;
  volume: number;
  distance: number;
  age: number;
}

export interface LiquidityMapStats {
  filtered: FilterCounters;
  zonesCreated: number;
  zonesMerged: number;
  refreshes: number;
  zonesPerTimeframe: Partial<Record<Timeframe, { active: number; total: number }>>;
  displacementsPerTimeframe: Partial<Record<Timeframe, { total: number; bullish: number; bearish: number }>>;
  lastRefreshTs: Partial<Record<Timeframe, number>>;
}

export interface LiquidityMapOptions {
  symbol: string;
  timeframes: Timeframe[];
  /** Per-timeframe overrides layered on the defaults */
  configs?: Partial<Record<Timeframe, TimeframeConfigOverrides>>;
  /** Plugins default to enabled */
  plugins?: Partial<Record<PluginName, boolean>>;
  logger?: Logger;
}
