import type { Candle, CandleFetcher, CandleStore, SyncResult, Timeframe, TrendState } from '@strata/schemas';
import type { LiquidityMapOptions, RefreshReport } from '@strata/liquidity';
import type { Logger } from '@strata/utils';

/**
 * External trend source consulted before each refresh
 */
export type TrendProvider = (symbol: string, timeframe: Timeframe) => TrendState | undefined;

export interface MarketStructureEngineOptions {
  symbols: string[];
  timeframes: Timeframe[];
  fetcher: CandleFetcher;
  store: CandleStore;
  /** Candles held per (symbol, timeframe) (default: HARDCODED_CONFIG.engine.windowSize) */
  windowSize?: number;
  trendProvider?: TrendProvider;
  /** Largest single fetch during backfill (default: 1000) */
  maxBackfillBatch?: number;
  /** Config overrides and plugin toggles shared by every symbol's map */
  liquidity?: Pick<LiquidityMapOptions, 'configs' | 'plugins'>;
  logger?: Logger;
}

export interface IngestResult {
  sync: SyncResult;
  /** Present when the candle moved the series forward */
  refresh?: RefreshReport;
}

export type EngineEvents = {
  'zones:refreshed': [symbol: string, report: RefreshReport];
  'window:backfilled': [symbol: string, timeframe: Timeframe, recovered: Candle[]];
};
