import type { Candle, LiquidityZone, Timeframe, TimeframeConfig } from '@strata/schemas';

export type PluginName =
  | 'orderBlock'
  | 'fairValueGap'
  | 'liquidityLevel'
  | 'structureBreak'
  | 'breakerBlock'
  | 'liquiditySweep'
  | 'displacement';

export const PLUGIN_NAMES: readonly PluginName[] = [
  'orderBlock',
  'fairValueGap',
  'liquidityLevel',
  'structureBreak',
  'breakerBlock',
  'liquiditySweep',
  'displacement',
];

/**
 * Every stored pattern has a stable id and the open time of the candle it
 * originates from
 */
export interface PatternBase {
  id: string;
  createdTs: number;
}

/**
 * Lifecycle of a pattern as seen by the zone set.
 * `invalidated` patterns of removable kinds drop their zone entirely.
 */
export type PatternStatus = 'active' | 'mitigated' | 'invalidated';

export interface ZoneContext {
  symbol: string;
  timeframe: Timeframe;
  /** Config in force for this refresh (trend-adapted) */
  config: TimeframeConfig;
}

export interface PluginStats {
  name: PluginName;
  enabled: boolean;
  total: number;
  active: number;
}

export interface LiquidityPlugin<TPattern extends PatternBase, TFilter> {
  readonly name: PluginName;
  readonly enabled: boolean;
  enable(): void;
  disable(): void;
  /**
   * New patterns in `candles`. Patterns are stored only by `commit`; a
   * plugin may still advance its own scan state here (structure breaks
   * track swings and trend as they scan).
   */
  detect(candles: Candle[]): TPattern[];
  /** Store patterns not already known; returns the ones added */
  commit(patterns: TPattern[]): TPattern[];
  update(candles: Candle[], price: number): void;
  get(filter?: TFilter): TPattern[];
  status(id: string): PatternStatus | undefined;
  toZone(pattern: TPattern, ctx: ZoneContext): LiquidityZone | null;
  stats(): PluginStats;
  clear(): void;
}
