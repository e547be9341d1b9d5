import type { Candle, LiquidityZone } from '@strata/schemas';
import { detectPivots } from '@strata/indicators';
import { createZone } from '../zones/zone';
import { BasePlugin } from './base-plugin';
import type { ZoneContext } from './types';

export type MarketTrend = 'up' | 'down' | 'ranging';

/** BOS continues the trend; CHOCH reverses it */
export type BreakKind = 'BOS' | 'CHOCH';

export interface StructureBreak {
  id: string;
  /** Open time of the breaking candle */
  createdTs: number;
  kind: BreakKind;
  bias: 'bullish' | 'bearish';
  /** Close of the breaking candle */
  breakPrice: number;
  /** Swing level that was broken */
  structurePrice: number;
  swingTs: number;
  volume: number;
  previousTrend: MarketTrend;
}

export interface StructureBreakFilter {
  kind?: BreakKind;
  bias?: 'bullish' | 'bearish';
  /** Most recent breaks to return (default: 20) */
  limit?: number;
}

interface Swing {
  price: number;
  ts: number;
  /** Open time of the candle that completed the right-hand window */
  confirmedTs: number;
  consumed: boolean;
}

const SWING_LOOKBACK = 5;
const SWING_WINDOW = 100;
const MAX_SWINGS = 50;
const SCAN_WINDOW = 50;
const MAX_BREAKS = 50;

export class StructureBreakPlugin extends BasePlugin<StructureBreak, StructureBreakFilter> {
  readonly name = 'structureBreak';

  private swingHighs: Swing[] = [];
  private swingLows: Swing[] = [];
  private trend: MarketTrend = 'ranging';
  private lastScannedTs: number | null = null;

  currentTrend(): MarketTrend {
    return this.trend;
  }

  /**
   * Scan candles not seen before for closes through confirmed swings.
   * Swing and trend state advance here; each candle is scanned once.
   */
  detect(candles: Candle[]): StructureBreak[] {
    if (candles.length < SWING_LOOKBACK * 2 + 5) return [];

    this.updateSwings(candles.slice(-SWING_WINDOW));

    const found: StructureBreak[] = [];
    for (const candle of candles.slice(-SCAN_WINDOW)) {
      if (this.lastScannedTs !== null && candle.openTs <= this.lastScannedTs) continue;

      const up = this.breakThrough(this.swingHighs, candle, (swing) => candle.close > swing.price);
      if (up) found.push(this.recordBreak(candle, up, 'bullish'));

      const down = this.breakThrough(this.swingLows, candle, (swing) => candle.close < swing.price);
      if (down) found.push(this.recordBreak(candle, down, 'bearish'));
    }

    const last = candles[candles.length - 1];
    this.lastScannedTs = last.openTs;
    return found;
  }

  update(_candles: Candle[], _price: number): void {
    // Breaks are historical facts; nothing to track after detection
  }

  get(filter: StructureBreakFilter = {}): StructureBreak[] {
    const { kind, bias, limit = 20 } = filter;
    return this.select((b) => (!kind || b.kind === kind) && (!bias || b.bias === bias))
      .sort((a, b) => b.createdTs - a.createdTs)
      .slice(0, limit);
  }

  toZone(brk: StructureBreak, ctx: ZoneContext): LiquidityZone {
    const buffer = ctx.config.zoneBufferPct;
    return createZone({
      id: brk.id,
      symbol: ctx.symbol,
      timeframe: ctx.timeframe,
      kind: 'structure-break',
      bias: brk.bias,
      priceLow: brk.structurePrice * (1 - buffer),
      priceHigh: brk.structurePrice * (1 + buffer),
      createdTs: brk.createdTs,
      strength: brk.kind === 'CHOCH' ? 'strong' : 'moderate',
      volume: brk.volume,
    });
  }

  clear(): void {
    super.clear();
    this.swingHighs = [];
    this.swingLows = [];
    this.trend = 'ranging';
    this.lastScannedTs = null;
  }

  protected prune(): void {
    if (this.patterns.size <= MAX_BREAKS) return;
    const newest = [...this.patterns.values()].sort((a, b) => b.createdTs - a.createdTs).slice(0, MAX_BREAKS);
    this.retain(newest.reverse());
  }

  private updateSwings(window: Candle[]): void {
    const { highs, lows } = detectPivots(window, SWING_LOOKBACK, SWING_LOOKBACK);
    const toSwing = (index: number, price: number): Swing => ({
      price,
      ts: window[index].openTs,
      confirmedTs: window[index + SWING_LOOKBACK].openTs,
      consumed: false,
    });

    this.swingHighs = mergeSwings(this.swingHighs, highs.map((p) => toSwing(p.index, p.price)));
    this.swingLows = mergeSwings(this.swingLows, lows.map((p) => toSwing(p.index, p.price)));
  }

  /**
   * Consume every confirmed swing the candle closes through and return the
   * most recent of them
   */
  private breakThrough(swings: Swing[], candle: Candle, isBroken: (swing: Swing) => boolean): Swing | null {
    let latest: Swing | null = null;
    for (const swing of swings) {
      if (swing.consumed || swing.confirmedTs >= candle.openTs || !isBroken(swing)) continue;
      swing.consumed = true;
      if (!latest || swing.ts > latest.ts) latest = swing;
    }
    return latest;
  }

  private recordBreak(candle: Candle, swing: Swing, bias: 'bullish' | 'bearish'): StructureBreak {
    const direction: MarketTrend = bias === 'bullish' ? 'up' : 'down';
    const previousTrend = this.trend;
    const kind: BreakKind = previousTrend === direction ? 'BOS' : 'CHOCH';
    this.trend = direction;

    return {
      id: `${this.symbol}_${this.timeframe}_${kind.toLowerCase()}_${bias}_${candle.openTs}`,
      createdTs: candle.openTs,
      kind,
      bias,
      breakPrice: candle.close,
      structurePrice: swing.price,
      swingTs: swing.ts,
      volume: candle.volume,
      previousTrend,
    };
  }
}

function mergeSwings(existing: Swing[], detected: Swing[]): Swing[] {
  const known = new Set(existing.map((swing) => swing.ts));
  const merged = [...existing, ...detected.filter((swing) => !known.has(swing.ts))];
  return merged.sort((a, b) => a.ts - b.ts).slice(-MAX_SWINGS);
}
