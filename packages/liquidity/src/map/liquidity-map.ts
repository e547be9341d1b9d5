import {
  type Candle,
  type LiquidityZone,
  type Timeframe,
  type TimeframeConfig,
  type TrendState,
  type ZoneFilter,
  type ZoneKind,
  type ZoneStrength,
  STRENGTH_RANK,
} from '@strata/schemas';
import { classifyVolatility, volumeSpikeRatio } from '@strata/indicators';
import { createLogger, relativeDistance, timeframeToSeconds, type Logger } from '@strata/utils';
import { createTimeframeConfig } from '../config/timeframe-config';
import { adaptToTrend } from '../config/trend-adaptation';
import { findConfluence } from '../confluence/confluence';
import { RefreshInProgressError } from '../errors';
import { BreakerBlockPlugin, type BreakerBlock, type BreakerBlockFilter } from '../plugins/breaker-block.plugin';
import {
  DisplacementPlugin,
  strongestDisplacement,
  type Displacement,
  type DisplacementFilter,
  type DisplacementMetric,
} from '../plugins/displacement.plugin';
import { FairValueGapPlugin, type FairValueGap, type FairValueGapFilter } from '../plugins/fair-value-gap.plugin';
import {
  LiquidityLevelPlugin,
  type LiquidityLevel,
  type LiquidityLevelFilter,
} from '../plugins/liquidity-level.plugin';
import {
  LiquiditySweepPlugin,
  type LiquiditySweep,
  type LiquiditySweepFilter,
} from '../plugins/liquidity-sweep.plugin';
import { OrderBlockPlugin, type OrderBlock, type OrderBlockFilter } from '../plugins/order-block.plugin';
import {
  StructureBreakPlugin,
  type MarketTrend,
  type StructureBreak,
  type StructureBreakFilter,
} from '../plugins/structure-break.plugin';
import { PLUGIN_NAMES, type LiquidityPlugin, type PatternBase, type PluginName, type ZoneContext } from '../plugins/types';
import { detectZoneCandidates } from '../zones/zone-detector';
import { zoneMidpoint } from '../zones/zone';
import { ageFilter, assignPdPosition, mergeZones, recalculateStrength, refreshTouches } from '../zones/zone-set';
import type {
  FilterCounters,
  LiquidityMapOptions,
  LiquidityMapStats,
  RefreshReport,
  RefreshSkipReason,
} from './types';

interface TimeframePlugins {
  orderBlock: OrderBlockPlugin;
  fairValueGap: FairValueGapPlugin;
  liquidityLevel: LiquidityLevelPlugin;
  structureBreak: StructureBreakPlugin;
  breakerBlock: BreakerBlockPlugin;
  liquiditySweep: LiquiditySweepPlugin;
  displacement: DisplacementPlugin;
}

interface TimeframeState {
  config: TimeframeConfig;
  zones: LiquidityZone[];
  plugins: TimeframePlugins;
  /** Candidate ids already evaluated, with their createdTs */
  seen: Map<string, number>;
  refreshing: boolean;
}

const KIND_TO_PLUGIN: Partial<Record<ZoneKind, PluginName>> = {
  'order-block': 'orderBlock',
  fvg: 'fairValueGap',
  'liquidity-level': 'liquidityLevel',
  'structure-break': 'structureBreak',
  'breaker-block': 'breakerBlock',
  'liquidity-sweep': 'liquiditySweep',
};

/** Kinds whose zone is dropped once the pattern is invalidated */
const REMOVABLE_KINDS = new Set<ZoneKind>(['order-block', 'fvg', 'breaker-block']);

const TOUCH_WINDOW = 20;
const SPIKE_LOOKBACK = 20;

const emptyCounters = (): FilterCounters => ({ atr: 0, volume: 0, distance: 0, age: 0 });

function collect<P extends PatternBase, F>(
  plugin: LiquidityPlugin<P, F>,
  candles: Candle[],
  ctx: ZoneContext
): LiquidityZone[] {
  if (!plugin.enabled) return [];
  const zones: LiquidityZone[] = [];
  for (const pattern of plugin.commit(plugin.detect(candles))) {
    const zone = plugin.toZone(pattern, ctx);
    if (zone) zones.push(zone);
  }
  return zones;
}

/**
 * Multi-timeframe liquidity zone map for one symbol
 *
 * Each timeframe keeps its own zones and plugin instances. Refreshes are
 * synchronous and serialized per timeframe.
 *
 * @example
 * const map = new LiquidityMap({ symbol: 'BTCUSDT', timeframes: ['5m', '1h'] });
 * const report = map.onCandleClose('5m', candles, lastClose);
 * const zones = map.getZones('5m', { nearPrice: lastClose });
 */
export class LiquidityMap {
  readonly symbol: string;
  private readonly states = new Map<Timeframe, TimeframeState>();
  private readonly logger: Logger;
  private counters = emptyCounters();
  private zonesCreated = 0;
  private zonesMerged = 0;
  private refreshes = 0;
  private lastRefreshTs: Partial<Record<Timeframe, number>> = {};

  constructor(options: LiquidityMapOptions) {
    this.symbol = options.symbol;
    this.logger = options.logger ?? createLogger('liquidity:map');
    const pluginLogger = options.logger?.child({ component: 'plugins' });

    for (const timeframe of options.timeframes) {
      const config = createTimeframeConfig(timeframe, options.configs?.[timeframe]);
      const opts = (name: PluginName) => ({ enabled: options.plugins?.[name] ?? true, logger: pluginLogger });

      const orderBlock = new OrderBlockPlugin(this.symbol, config, opts('orderBlock'));
      const liquidityLevel = new LiquidityLevelPlugin(this.symbol, config, opts('liquidityLevel'));
      this.states.set(timeframe, {
        config,
        zones: [],
        seen: new Map(),
        refreshing: false,
        plugins: {
          orderBlock,
          fairValueGap: new FairValueGapPlugin(this.symbol, config, opts('fairValueGap')),
          liquidityLevel,
          structureBreak: new StructureBreakPlugin(this.symbol, config, opts('structureBreak')),
          breakerBlock: new BreakerBlockPlugin(this.symbol, config, orderBlock, opts('breakerBlock')),
          liquiditySweep: new LiquiditySweepPlugin(this.symbol, config, liquidityLevel, opts('liquiditySweep')),
          displacement: new DisplacementPlugin(this.symbol, config, opts('displacement')),
        },
      });
    }
  }

  get timeframes(): Timeframe[] {
    return [...this.states.keys()];
  }

  getConfig(timeframe: Timeframe): TimeframeConfig | undefined {
    return this.states.get(timeframe)?.config;
  }

  /**
   * Refresh one timeframe after a candle closes
   *
   * @param candles - Closed candles for the timeframe, oldest first
   * @param currentPrice - Reference price for the distance filter
   * @param trend - Optional external trend used to adapt detection
   * @throws RefreshInProgressError when re-entered for the same timeframe
   */
  onCandleClose(
    timeframe: Timeframe,
    candles: Candle[],
    currentPrice: number,
    trend?: TrendState
  ): RefreshReport {
    const state = this.states.get(timeframe);
    if (!state) {
      this.logger.warn({ event: 'refresh_unknown_timeframe', symbol: this.symbol, timeframe }, `No config for ${timeframe}`);
      return newReport(timeframe, 'unknown-timeframe');
    }
    if (state.refreshing) {
      throw new RefreshInProgressError(timeframe);
    }

    state.refreshing = true;
    try {
      return this.refresh(timeframe, state, candles, currentPrice, trend);
    } finally {
      state.refreshing = false;
    }
  }

  private refresh(
    timeframe: Timeframe,
    state: TimeframeState,
    candles: Candle[],
    currentPrice: number,
    trend?: TrendState
  ): RefreshReport {
    const { config } = state;
    const window = candles.slice(-config.lookbackCandles);
    const required = Math.max(config.pivotLeft + config.pivotRight + 1, config.atrPeriod + 1);
    if (window.length < required) {
      return newReport(timeframe, 'insufficient-candles');
    }

    const nowTs = window[window.length - 1].openTs;
    const report = newReport(timeframe);

    // 1. Volatility gate
    const volatility = classifyVolatility(window, {
      period: config.atrPeriod,
      lowMultiplier: config.atrMinMultiplier,
      highMultiplier: config.atrMaxMultiplier,
    });

    let candidates: LiquidityZone[] = [];
    if (volatility && volatility.state !== 'normal') {
      this.counters.atr++;
      report.skippedReason = 'volatility';
      this.logger.debug({
        event: 'refresh_volatility_gate',
        symbol: this.symbol,
        timeframe,
        state: volatility.state,
        atr: volatility.current,
        baseline: volatility.baseline,
      }, `Detection skipped on ${timeframe}: ${volatility.state} volatility`);
    } else {
      // 2-4. Adapt, detect, filter
      report.refreshed = true;
      candidates = this.filterCandidates(state, this.detect(state, window, trend), window, currentPrice, report);
    }

    // 5. Age
    const aged = ageFilter(state.zones, nowTs, timeframe, config.maxZoneAgeCandles);
    report.removedByAge = aged.removed.length;
    this.counters.age += aged.removed.length;
    this.forgetSeen(state, nowTs);

    // 6. Merge
    const merge = mergeZones(aged.kept, candidates, config.mergeRadiusPct);
    report.created = merge.added;
    report.merged = merge.merged;
    this.zonesCreated += merge.added;
    this.zonesMerged += merge.merged;

    // 7. Pattern lifecycle and touches
    for (const name of PLUGIN_NAMES) {
      const plugin = state.plugins[name];
      if (plugin.enabled) plugin.update(window, currentPrice);
    }
    let zones = this.applyPatternStatus(state, merge.zones);
    zones = refreshTouches(zones, window.slice(-TOUCH_WINDOW));

    // 8. Strength and premium/discount placement
    zones = assignPdPosition(recalculateStrength(zones), window);

    state.zones = zones;
    this.refreshes++;
    this.lastRefreshTs[timeframe] = nowTs;

    this.logger.debug({
      event: 'refresh_complete',
      symbol: this.symbol,
      timeframe,
      created: report.created,
      merged: report.merged,
      removedByAge: report.removedByAge,
      zones: zones.length,
    }, `Refreshed ${this.symbol} ${timeframe}`);

    return report;
  }

  private detect(state: TimeframeState, window: Candle[], trend?: TrendState): LiquidityZone[] {
    const config = adaptToTrend(state.config, trend);
    const ctx: ZoneContext = { symbol: this.symbol, timeframe: config.timeframe, config };
    const { plugins } = state;

    return [
      ...detectZoneCandidates(this.symbol, window, config),
      ...collect(plugins.orderBlock, window, ctx),
      ...collect(plugins.fairValueGap, window, ctx),
      ...collect(plugins.liquidityLevel, window, ctx),
      ...collect(plugins.structureBreak, window, ctx),
      ...collect(plugins.breakerBlock, window, ctx),
      ...collect(plugins.liquiditySweep, window, ctx),
      ...collect(plugins.displacement, window, ctx),
    ];
  }

  /**
   * Volume-spike then distance filter. Each candidate id is evaluated once;
   * later re-detections of the same pivot are ignored.
   */
  private filterCandidates(
    state: TimeframeState,
    candidates: LiquidityZone[],
    window: Candle[],
    currentPrice: number,
    report: RefreshReport
  ): LiquidityZone[] {
    const { config } = state;
    const indexByTs = new Map(window.map((candle, i) => [candle.openTs, i]));
    const accepted: LiquidityZone[] = [];

    for (const zone of candidates) {
      if (state.seen.has(zone.id)) continue;
      state.seen.set(zone.id, zone.createdTs);

      if (!passesVolumeSpike(zone, window, indexByTs, config.volumeSpikeMultiplier)) {
        report.filtered.volume++;
        this.counters.volume++;
        continue;
      }
      if (relativeDistance(zoneMidpoint(zone), currentPrice) < config.minZoneDistancePct) {
        report.filtered.distance++;
        this.counters.distance++;
        continue;
      }
      accepted.push(zone);
    }
    return accepted;
  }

  private forgetSeen(state: TimeframeState, nowTs: number): void {
    const interval = timeframeToSeconds(state.config.timeframe);
    for (const [id, createdTs] of state.seen) {
      if ((nowTs - createdTs) / interval > state.config.maxZoneAgeCandles) state.seen.delete(id);
    }
  }

  private applyPatternStatus(state: TimeframeState, zones: LiquidityZone[]): LiquidityZone[] {
    const result: LiquidityZone[] = [];
    for (const zone of zones) {
      const name = KIND_TO_PLUGIN[zone.kind];
      const status = name ? state.plugins[name].status(zone.id) : undefined;
      if (status === 'invalidated' && REMOVABLE_KINDS.has(zone.kind)) continue;
      result.push(status === 'mitigated' || status === 'invalidated' ? { ...zone, isMitigated: true } : zone);
    }
    return result;
  }

  // ============================================
  // Zone queries
  // ============================================

  /**
   * Zones for one timeframe, newest first or nearest to `nearPrice`
   */
  getZones(timeframe: Timeframe, filter: ZoneFilter = {}): LiquidityZone[] {
    return sortZones(this.states.get(timeframe)?.zones ?? [], filter);
  }

  getAllZones(filter: ZoneFilter = {}): LiquidityZone[] {
    return sortZones(this.liveZones(), filter);
  }

  /**
   * Zones that line up across timeframes, strongest confluence first
   *
   * Representatives carry the group weight in `confluenceWeight`; the
   * live zone is updated too.
   */
  getConfluenceZones(minDistinctTimeframes = 2, minStrength?: ZoneStrength): LiquidityZone[] {
    const snapshot = this.liveZones().map((zone) => ({ ...zone }));
    const groups = findConfluence(snapshot, (tf) => this.configFor(tf), minDistinctTimeframes, minStrength);

    for (const group of groups) {
      const live = this.states.get(group.zone.timeframe)?.zones.find((zone) => zone.id === group.zone.id);
      if (live) live.confluenceWeight = group.weight;
    }
    return groups.map((group) => group.zone);
  }

  /** Closest active support entirely below `price` */
  getNearestSupport(price: number): LiquidityZone | null {
    let best: LiquidityZone | null = null;
    for (const zone of this.liveZones()) {
      if (zone.kind !== 'support' || zone.isMitigated || zone.priceHigh >= price) continue;
      if (!best || zone.priceHigh > best.priceHigh) best = zone;
    }
    return best ? { ...best } : null;
  }

  /** Closest active resistance entirely above `price` */
  getNearestResistance(price: number): LiquidityZone | null {
    let best: LiquidityZone | null = null;
    for (const zone of this.liveZones()) {
      if (zone.kind !== 'resistance' || zone.isMitigated || zone.priceLow <= price) continue;
      if (!best || zone.priceLow < best.priceLow) best = zone;
    }
    return best ? { ...best } : null;
  }

  // ============================================
  // Pattern queries (all timeframes when none is given)
  // ============================================

  getOrderBlocks(timeframe?: Timeframe, filter?: OrderBlockFilter): OrderBlock[] {
    return this.patternsOf(timeframe, (p) => p.orderBlock.get(filter));
  }

  getFairValueGaps(timeframe?: Timeframe, filter?: FairValueGapFilter): FairValueGap[] {
    return this.patternsOf(timeframe, (p) => p.fairValueGap.get(filter));
  }

  getLiquidityLevels(timeframe?: Timeframe, filter?: LiquidityLevelFilter): LiquidityLevel[] {
    return this.patternsOf(timeframe, (p) => p.liquidityLevel.get(filter));
  }

  getStructureBreaks(timeframe?: Timeframe, filter?: StructureBreakFilter): StructureBreak[] {
    return this.patternsOf(timeframe, (p) => p.structureBreak.get(filter));
  }

  getBreakerBlocks(timeframe?: Timeframe, filter?: BreakerBlockFilter): BreakerBlock[] {
    return this.patternsOf(timeframe, (p) => p.breakerBlock.get(filter));
  }

  getSweeps(timeframe?: Timeframe, filter?: LiquiditySweepFilter): LiquiditySweep[] {
    return this.patternsOf(timeframe, (p) => p.liquiditySweep.get(filter));
  }

  /**
   * Nearest fair value gap across all timeframes
   *
   * `above` takes the lowest gap starting above `price`, `below` the
   * highest gap ending below it, `both` the gap whose midpoint is closest.
   */
  getNearestFairValueGap(
    price: number,
    direction: 'above' | 'below' | 'both' = 'both',
    onlyUnfilled = true
  ): FairValueGap | null {
    const gaps = this.getFairValueGaps(undefined, { onlyUnfilled });
    let best: FairValueGap | null = null;
    let bestScore = Infinity;
    for (const gap of gaps) {
      let score: number;
      if (direction === 'above') {
        if (gap.gapLow <= price) continue;
        score = gap.gapLow - price;
      } else if (direction === 'below') {
        if (gap.gapHigh >= price) continue;
        score = price - gap.gapHigh;
      } else {
        score = Math.abs((gap.gapLow + gap.gapHigh) / 2 - price);
      }
      if (score < bestScore) {
        best = gap;
        bestScore = score;
      }
    }
    return best;
  }

  /** Displacements newest first (by end time) across the requested timeframes */
  getDisplacements(timeframe?: Timeframe, filter?: DisplacementFilter): Displacement[] {
    return this.patternsOf(timeframe, (p) => p.displacement.get(filter)).sort((a, b) => b.endTs - a.endTs);
  }

  getRecentDisplacements(timeframe?: Timeframe, count = 10): Displacement[] {
    return this.getDisplacements(timeframe).slice(0, count);
  }

  getStrongestDisplacement(timeframe?: Timeframe, metric: DisplacementMetric = 'movePct'): Displacement | null {
    return strongestDisplacement(this.getDisplacements(timeframe), metric);
  }

  /** Trend state tracked by the structure-break plugin */
  getMarketTrend(timeframe: Timeframe): MarketTrend | null {
    return this.states.get(timeframe)?.plugins.structureBreak.currentTrend() ?? null;
  }

  // ============================================
  // Stats and plugin control
  // ============================================

  getStats(): LiquidityMapStats {
    const zonesPerTimeframe: LiquidityMapStats['zonesPerTimeframe'] = {};
    const displacementsPerTimeframe: LiquidityMapStats['displacementsPerTimeframe'] = {};
    for (const [timeframe, state] of this.states) {
      zonesPerTimeframe[timeframe] = {
        active: state.zones.filter((zone) => !zone.isMitigated).length,
        total: state.zones.length,
      };
      const displacements = state.plugins.displacement.get();
      const bullish = displacements.filter((d) => d.direction === 'bullish').length;
      displacementsPerTimeframe[timeframe] = {
        total: displacements.length,
        bullish,
        bearish: displacements.length - bullish,
      };
    }
    return {
      filtered: { ...this.counters },
      zonesCreated: this.zonesCreated,
      zonesMerged: this.zonesMerged,
      refreshes: this.refreshes,
      zonesPerTimeframe,
      displacementsPerTimeframe,
      lastRefreshTs: { ...this.lastRefreshTs },
    };
  }

  resetStats(): void {
    this.counters = emptyCounters();
    this.zonesCreated = 0;
    this.zonesMerged = 0;
    this.refreshes = 0;
    this.lastRefreshTs = {};
  }

  /** Enable a plugin on one timeframe, or all when none is given */
  enablePlugin(name: PluginName, timeframe?: Timeframe): void {
    for (const state of this.statesFor(timeframe)) state.plugins[name].enable();
    this.logger.info({ event: 'plugin_enabled', symbol: this.symbol, plugin: name, timeframe }, `Enabled ${name}`);
  }

  disablePlugin(name: PluginName, timeframe?: Timeframe): void {
    for (const state of this.statesFor(timeframe)) state.plugins[name].disable();
    this.logger.info({ event: 'plugin_disabled', symbol: this.symbol, plugin: name, timeframe }, `Disabled ${name}`);
  }

  getPluginStatus(): Partial<Record<Timeframe, Record<PluginName, boolean>>> {
    const status: Partial<Record<Timeframe, Record<PluginName, boolean>>> = {};
    for (const [timeframe, { plugins }] of this.states) {
      status[timeframe] = {
        orderBlock: plugins.orderBlock.enabled,
        fairValueGap: plugins.fairValueGap.enabled,
        liquidityLevel: plugins.liquidityLevel.enabled,
        structureBreak: plugins.structureBreak.enabled,
        breakerBlock: plugins.breakerBlock.enabled,
        liquiditySweep: plugins.liquiditySweep.enabled,
        displacement: plugins.displacement.enabled,
      };
    }
    return status;
  }

  private configFor(timeframe: Timeframe): TimeframeConfig {
    return this.states.get(timeframe)?.config ?? createTimeframeConfig(timeframe);
  }

  private liveZones(): LiquidityZone[] {
    return [...this.states.values()].flatMap((state) => state.zones);
  }

  private statesFor(timeframe?: Timeframe): TimeframeState[] {
    if (timeframe === undefined) return [...this.states.values()];
    const state = this.states.get(timeframe);
    return state ? [state] : [];
  }

  private patternsOf<T>(timeframe: Timeframe | undefined, pick: (plugins: TimeframePlugins) => T[]): T[] {
    return this.statesFor(timeframe).flatMap((state) => pick(state.plugins));
  }
}

function newReport(timeframe: Timeframe, skippedReason?: RefreshSkipReason): RefreshReport {
  return {
    timeframe,
    refreshed: false,
    ...(skippedReason ? { skippedReason } : {}),
    created: 0,
    merged: 0,
    removedByAge: 0,
    filtered: { volume: 0, distance: 0 },
  };
}

/**
 * Zones need a volume spike on their originating candle. Zones whose
 * candle has no history before it in the window pass.
 */
function passesVolumeSpike(
  zone: LiquidityZone,
  window: Candle[],
  indexByTs: Map<number, number>,
  multiplier: number
): boolean {
  const index = indexByTs.get(zone.createdTs);
  if (index === undefined || index === 0) return true;

  const trailing = window.slice(Math.max(0, index - SPIKE_LOOKBACK), index).map((candle) => candle.volume);
  const ratio = volumeSpikeRatio(trailing, window[index].volume, SPIKE_LOOKBACK);
  return ratio !== null && ratio >= multiplier;
}

function sortZones(zones: LiquidityZone[], filter: ZoneFilter): LiquidityZone[] {
  const { kinds, bias, includeMitigated = false, minStrength, nearPrice } = filter;
  const result = zones
    .filter(
      (zone) =>
        (includeMitigated || !zone.isMitigated) &&
        (!kinds || kinds.includes(zone.kind)) &&
        (!bias || zone.bias === bias) &&
        (!minStrength || STRENGTH_RANK[zone.strength] >= STRENGTH_RANK[minStrength])
    )
    .map((zone) => ({ ...zone }));

  if (nearPrice !== undefined) {
    return result.sort(
      (a, b) => Math.abs(zoneMidpoint(a) - nearPrice) - Math.abs(zoneMidpoint(b) - nearPrice)
    );
  }
  return result.sort((a, b) => b.createdTs - a.createdTs);
}
