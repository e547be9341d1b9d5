import { STRENGTH_RANK, type Candle, type LiquidityZone, type TimeframeConfig, type ZoneStrength } from '@strata/schemas';
import { createZone } from '../zones/zone';
import { BasePlugin, type PluginOptions } from './base-plugin';
import type { LiquidityLevelSource } from './liquidity-level.plugin';
import type { ZoneContext } from './types';

/** Buy-side sweeps run the highs, sell-side sweeps the lows */
export type SweepSide = 'buy-side' | 'sell-side';

export interface LiquiditySweep {
  id: string;
  /** Open time of the sweeping candle */
  createdTs: number;
  side: SweepSide;
  levelId: string;
  levelPrice: number;
  /** High (buy-side) or low (sell-side) of the sweeping candle */
  sweepPrice: number;
  volume: number;
  confirmed: boolean;
  reversalTs: number | null;
  strength: ZoneStrength;
}

export interface LiquiditySweepFilter {
  side?: SweepSide;
  confirmedOnly?: boolean;
  minStrength?: ZoneStrength;
}

const REVERSAL_CANDLES = 5;
const UPDATE_WINDOW = 10;
const MAX_SWEEPS = 100;

export class LiquiditySweepPlugin extends BasePlugin<LiquiditySweep, LiquiditySweepFilter> {
  readonly name = 'liquiditySweep';

  constructor(
    symbol: string,
    config: TimeframeConfig,
    private readonly source: LiquidityLevelSource,
    options: PluginOptions = {}
  ) {
    super(symbol, config, options);
  }

  detect(candles: Candle[]): LiquiditySweep[] {
    const found: LiquiditySweep[] = [];

    for (const level of this.source.getSweptLevels()) {
      if (level.sweptTs === null) continue;
      const id = `${this.symbol}_${this.timeframe}_sweep_${level.id}`;
      if (this.patterns.has(id)) continue;

      const index = candles.findIndex((c) => c.openTs === level.sweptTs);
      if (index === -1) continue;

      const candle = candles[index];
      const sweep: LiquiditySweep = {
        id,
        createdTs: candle.openTs,
        side: level.side === 'BSL' ? 'buy-side' : 'sell-side',
        levelId: level.id,
        levelPrice: level.price,
        sweepPrice: level.side === 'BSL' ? candle.high : candle.low,
        volume: candle.volume,
        confirmed: false,
        reversalTs: null,
        strength: 'moderate',
      };

      const reversal = candles
        .slice(index + 1, index + 1 + REVERSAL_CANDLES)
        .find((c) => this.isReversal(sweep, c));
      if (reversal) this.confirm(sweep, reversal);

      found.push(sweep);
    }
    return found;
  }

  /** Late confirmation for sweeps still waiting on a reversal */
  update(candles: Candle[], _price: number): void {
    const recent = candles.slice(-UPDATE_WINDOW);
    for (const sweep of this.patterns.values()) {
      if (sweep.confirmed) continue;
      const reversal = recent.find((c) => c.openTs > sweep.createdTs && this.isReversal(sweep, c));
      if (reversal) this.confirm(sweep, reversal);
    }
  }

  get(filter: LiquiditySweepFilter = {}): LiquiditySweep[] {
    const { side, confirmedOnly = false, minStrength } = filter;
    return this.select(
      (s) =>
        (!side || s.side === side) &&
        (!confirmedOnly || s.confirmed) &&
        (!minStrength || STRENGTH_RANK[s.strength] >= STRENGTH_RANK[minStrength])
    ).sort((a, b) => b.createdTs - a.createdTs);
  }

  toZone(sweep: LiquiditySweep, ctx: ZoneContext): LiquidityZone {
    return createZone({
      id: sweep.id,
      symbol: ctx.symbol,
      timeframe: ctx.timeframe,
      kind: 'liquidity-sweep',
      bias: sweep.side === 'buy-side' ? 'bearish' : 'bullish',
      priceLow: Math.min(sweep.levelPrice, sweep.sweepPrice),
      priceHigh: Math.max(sweep.levelPrice, sweep.sweepPrice),
      createdTs: sweep.createdTs,
      strength: sweep.strength,
      volume: sweep.volume,
    });
  }

  protected prune(): void {
    if (this.patterns.size <= MAX_SWEEPS) return;
    this.retain([...this.patterns.values()].slice(-MAX_SWEEPS));
  }

  /** Price moved back away from the level by at least the rejection fraction */
  private isReversal(sweep: LiquiditySweep, candle: Candle): boolean {
    const rejection = this.config.sweepRejectionPct;
    return sweep.side === 'buy-side'
      ? (sweep.levelPrice - candle.low) / sweep.levelPrice >= rejection
      : (candle.high - sweep.levelPrice) / sweep.levelPrice >= rejection;
  }

  private confirm(sweep: LiquiditySweep, candle: Candle): void {
    sweep.confirmed = true;
    sweep.reversalTs = candle.openTs;
    sweep.strength = 'strong';
  }
}
