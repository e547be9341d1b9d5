import type { Candle, LiquidityZone } from '@strata/schemas';
import { timeframeToSeconds } from '@strata/utils';
import { createZone } from '../zones/zone';
import { BasePlugin } from './base-plugin';
import type { PatternStatus, ZoneContext } from './types';

export type GapBias = 'bullish' | 'bearish';

/**
 * Three-candle imbalance: the wicks of the outer candles do not overlap
 */
export interface FairValueGap {
  id: string;
  /** Open time of the middle candle */
  createdTs: number;
  /** Open time of the third candle, after which fills are tracked */
  confirmedTs: number;
  bias: GapBias;
  gapLow: number;
  gapHigh: number;
  volume: number;
  touchCount: number;
  lastTestTs: number | null;
  /** Deepest fill so far, 0-100 */
  fillPct: number;
  isFilled: boolean;
}

export interface FairValueGapFilter {
  bias?: GapBias;
  /** Default: true */
  onlyUnfilled?: boolean;
}

const FILLED_AT_PCT = 75;
const UPDATE_WINDOW = 10;
const MAX_FILLED = 50;

export class FairValueGapPlugin extends BasePlugin<FairValueGap, FairValueGapFilter> {
  readonly name = 'fairValueGap';

  /** Gaps already past `maxZoneAgeCandles` are not reported */
  detect(candles: Candle[]): FairValueGap[] {
    const found: FairValueGap[] = [];
    const last = candles[candles.length - 1];
    if (!last) return found;

    for (let i = 1; i < candles.length - 1; i++) {
      const prev = candles[i - 1];
      const middle = candles[i];
      const next = candles[i + 1];

      let bias: GapBias;
      let gapLow: number;
      let gapHigh: number;
      if (prev.high < next.low) {
        bias = 'bullish';
        gapLow = prev.high;
        gapHigh = next.low;
      } else if (prev.low > next.high) {
        bias = 'bearish';
        gapLow = next.high;
        gapHigh = prev.low;
      } else {
        continue;
      }

      const id = `${this.symbol}_${this.timeframe}_fvg_${bias}_${middle.openTs}`;
      if (this.patterns.has(id) || this.isExpired(middle.openTs, last.openTs)) continue;

      found.push({
        id,
        createdTs: middle.openTs,
        confirmedTs: next.openTs,
        bias,
        gapLow,
        gapHigh,
        volume: middle.volume,
        touchCount: 0,
        lastTestTs: null,
        fillPct: 0,
        isFilled: false,
      });
    }

    return found;
  }

  /**
   * Track retracements into open gaps. Bullish gaps fill from the top
   * down, bearish gaps from the bottom up.
   */
  update(candles: Candle[], _price: number): void {
    const recent = candles.slice(-UPDATE_WINDOW);

    for (const gap of this.patterns.values()) {
      if (gap.isFilled) continue;
      const size = gap.gapHigh - gap.gapLow;

      for (const candle of recent) {
        if (candle.openTs <= gap.confirmedTs) continue;
        if (gap.lastTestTs !== null && candle.openTs <= gap.lastTestTs) continue;
        if (candle.low > gap.gapHigh || candle.high < gap.gapLow) continue;

        gap.touchCount++;
        gap.lastTestTs = candle.openTs;

        const filled =
          gap.bias === 'bullish'
            ? gap.gapHigh - Math.max(candle.low, gap.gapLow)
            : Math.min(candle.high, gap.gapHigh) - gap.gapLow;
        const fillPct = size > 0 ? Math.min(100, (filled / size) * 100) : 100;
        gap.fillPct = Math.max(gap.fillPct, fillPct);

        if (gap.fillPct >= FILLED_AT_PCT) {
          gap.isFilled = true;
          break;
        }
      }
    }

    const last = candles[candles.length - 1];
    if (last) this.expireOpen(last.openTs);
    this.prune();
  }

  get(filter: FairValueGapFilter = {}): FairValueGap[] {
    const { bias, onlyUnfilled = true } = filter;
    return this.select((gap) => (!bias || gap.bias === bias) && (!onlyUnfilled || !gap.isFilled)).sort(
      (a, b) => b.createdTs - a.createdTs
    );
  }

  toZone(gap: FairValueGap, ctx: ZoneContext): LiquidityZone {
    return createZone({
      id: gap.id,
      symbol: ctx.symbol,
      timeframe: ctx.timeframe,
      kind: 'fvg',
      bias: gap.bias,
      priceLow: gap.gapLow,
      priceHigh: gap.gapHigh,
      createdTs: gap.createdTs,
      volume: gap.volume,
    });
  }

  protected statusOf(gap: FairValueGap): PatternStatus {
    return gap.isFilled ? 'invalidated' : 'active';
  }

  /** Keep the newest filled gaps */
  protected prune(): void {
    const filled = [...this.patterns.values()].filter((gap) => gap.isFilled);
    if (filled.length <= MAX_FILLED) return;
    const drop = new Set(
      filled
        .sort((a, b) => b.createdTs - a.createdTs)
        .slice(MAX_FILLED)
        .map((gap) => gap.id)
    );
    this.retain([...this.patterns.values()].filter((gap) => !drop.has(gap.id)));
  }

  /** Drop unfilled gaps older than `maxZoneAgeCandles` */
  private expireOpen(nowTs: number): void {
    const kept = [...this.patterns.values()].filter((gap) => gap.isFilled || !this.isExpired(gap.createdTs, nowTs));
    if (kept.length !== this.patterns.size) this.retain(kept);
  }

  private isExpired(createdTs: number, nowTs: number): boolean {
    return (nowTs - createdTs) / timeframeToSeconds(this.timeframe) > this.config.maxZoneAgeCandles;
  }
}
