import type { Candle, LiquidityZone } from '@strata/schemas';
import { timeframeToSeconds } from '@strata/utils';
import { createZone } from '../zones/zone';
import { BasePlugin } from './base-plugin';
import type { PatternStatus, ZoneContext } from './types';

/** Buy-side liquidity rests above equal highs, sell-side below equal lows */
export type LevelSide = 'BSL' | 'SSL';

export interface LiquidityLevel {
  id: string;
  /** Open time of the first touch */
  createdTs: number;
  side: LevelSide;
  /** Mean of the clustered highs (BSL) or lows (SSL) */
  price: number;
  /** Open times of the touching candles, ascending */
  touches: number[];
  volume: number;
  isSwept: boolean;
  sweptTs: number | null;
  /** High (BSL) or low (SSL) of the sweeping candle */
  sweepExtreme: number | null;
}

export interface LiquidityLevelFilter {
  side?: LevelSide;
  /** Default: true */
  onlyUnswept?: boolean;
}

/**
 * Read-only view the sweep plugin builds on
 */
export interface LiquidityLevelSource {
  getSweptLevels(limit?: number): LiquidityLevel[];
}

const TOLERANCE = 0.001;
const MIN_TOUCHES = 2;
const MIN_CANDLES = 5;
const UPDATE_WINDOW = 10;
const MAX_AGE_CANDLES = 500;
const MAX_SWEPT = 100;

interface Touch {
  price: number;
  ts: number;
  volume: number;
}

const near = (a: number, b: number) => Math.abs(a - b) / b <= TOLERANCE;

function cluster(points: Touch[]): Touch[][] {
  const used = new Set<number>();
  const clusters: Touch[][] = [];
  for (let i = 0; i < points.length; i++) {
    if (used.has(i)) continue;
    const members = [i];
    for (let j = i + 1; j < points.length; j++) {
      if (!used.has(j) && near(points[j].price, points[i].price)) members.push(j);
    }
    if (members.length < MIN_TOUCHES) continue;
    members.forEach((index) => used.add(index));
    clusters.push(members.map((index) => points[index]));
  }
  return clusters;
}

/**
 * Equal highs and equal lows, and the sweeps that take them out
 */
export class LiquidityLevelPlugin
  extends BasePlugin<LiquidityLevel, LiquidityLevelFilter>
  implements LiquidityLevelSource
{
  readonly name = 'liquidityLevel';

  detect(candles: Candle[]): LiquidityLevel[] {
    if (candles.length < MIN_CANDLES) return [];

    const found: LiquidityLevel[] = [];
    for (const side of ['BSL', 'SSL'] as const) {
      const points = candles.map((c) => ({
        price: side === 'BSL' ? c.high : c.low,
        ts: c.openTs,
        volume: c.volume,
      }));

      for (const members of cluster(points)) {
        const touches = members.map((m) => m.ts).sort((a, b) => a - b);
        const level: LiquidityLevel = {
          id: `${this.symbol}_${this.timeframe}_${side.toLowerCase()}_${touches[0]}`,
          createdTs: touches[0],
          side,
          price: members.reduce((total, m) => total + m.price, 0) / members.length,
          touches,
          volume: members.reduce((total, m) => total + m.volume, 0),
          isSwept: false,
          sweptTs: null,
          sweepExtreme: null,
        };
        if (!this.patterns.has(level.id) && !this.isDuplicate(level)) found.push(level);
      }
    }
    return found;
  }

  update(candles: Candle[], _price: number): void {
    const recent = candles.slice(-UPDATE_WINDOW);
    const penetration = this.config.sweepPenetrationPct;

    for (const level of this.patterns.values()) {
      if (level.isSwept) continue;

      for (const candle of recent) {
        if (candle.openTs <= level.touches[level.touches.length - 1]) continue;

        const extreme = level.side === 'BSL' ? candle.high : candle.low;
        const swept =
          level.side === 'BSL'
            ? extreme > level.price * (1 + penetration)
            : extreme < level.price * (1 - penetration);

        if (swept) {
          level.isSwept = true;
          level.sweptTs = candle.openTs;
          level.sweepExtreme = extreme;
          this.logger.debug({
            event: 'level_swept',
            symbol: this.symbol,
            timeframe: this.timeframe,
            side: level.side,
            price: level.price,
          }, `${level.side} swept`);
          break;
        }
        if (near(extreme, level.price)) {
          level.touches.push(candle.openTs);
          level.volume += candle.volume;
        }
      }
    }

    const last = candles[candles.length - 1];
    if (last) this.pruneStale(last.openTs);
  }

  get(filter: LiquidityLevelFilter = {}): LiquidityLevel[] {
    const { side, onlyUnswept = true } = filter;
    return this.select((level) => (!side || level.side === side) && (!onlyUnswept || !level.isSwept)).sort(
      (a, b) => b.createdTs - a.createdTs
    );
  }

  getSweptLevels(limit = 20): LiquidityLevel[] {
    return this.select((level) => level.isSwept)
      .sort((a, b) => (b.sweptTs ?? 0) - (a.sweptTs ?? 0))
      .slice(0, limit);
  }

  toZone(level: LiquidityLevel, ctx: ZoneContext): LiquidityZone {
    const buffer = ctx.config.zoneBufferPct;
    return createZone({
      id: level.id,
      symbol: ctx.symbol,
      timeframe: ctx.timeframe,
      kind: 'liquidity-level',
      bias: level.side === 'SSL' ? 'bullish' : 'bearish',
      priceLow: level.price * (1 - buffer),
      priceHigh: level.price * (1 + buffer),
      createdTs: level.createdTs,
      strength: level.touches.length >= 3 ? 'strong' : 'moderate',
      touchCount: level.touches.length,
      volume: level.volume,
    });
  }

  protected statusOf(level: LiquidityLevel): PatternStatus {
    return level.isSwept ? 'mitigated' : 'active';
  }

  protected isDuplicate(level: LiquidityLevel): boolean {
    for (const existing of this.patterns.values()) {
      if (!existing.isSwept && existing.side === level.side && near(level.price, existing.price)) return true;
    }
    return false;
  }

  /** Drop never-swept levels whose first touch is too old, and the oldest sweeps */
  private pruneStale(nowTs: number): void {
    const interval = timeframeToSeconds(this.timeframe);
    const keepSwept = new Set(this.getSweptLevels(MAX_SWEPT).map((level) => level.id));
    const kept = [...this.patterns.values()].filter((level) =>
      level.isSwept ? keepSwept.has(level.id) : (nowTs - level.createdTs) / interval < MAX_AGE_CANDLES
    );
    if (kept.length !== this.patterns.size) this.retain(kept);
  }
}
