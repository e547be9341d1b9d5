/**
 * @strata/engine
 *
 * Candle sync, rolling windows and liquidity maps wired together
 */

export { MarketStructureEngine } from './market-structure-engine';
export { CandleWindow } from './candle-window';
export { createEngineFromEnv, type EngineRuntime } from './bootstrap';
export type { EngineEvents, IngestResult, MarketStructureEngineOptions, TrendProvider } from './types';
