import type { Candle, LiquidityZone, TimeframeConfig, ZoneStrength } from '@strata/schemas';
import { createZone } from '../zones/zone';
import { BasePlugin, type PluginOptions } from './base-plugin';
import type { OrderBlockSource } from './order-block.plugin';
import type { PatternStatus, ZoneContext } from './types';

/**
 * A broken order block that now acts in the opposite direction
 */
export interface BreakerBlock {
  id: string;
  /** Open time of the original order block candle */
  createdTs: number;
  bias: 'bullish' | 'bearish';
  originalBias: 'bullish' | 'bearish';
  priceLow: number;
  priceHigh: number;
  volume: number;
  strength: ZoneStrength;
  brokenTs: number;
  testCount: number;
  lastTestTs: number | null;
  isInvalidated: boolean;
}

export interface BreakerBlockFilter {
  bias?: 'bullish' | 'bearish';
  /** Default: true */
  onlyActive?: boolean;
}

const UPDATE_WINDOW = 20;
const MAX_BREAKERS = 100;

export class BreakerBlockPlugin extends BasePlugin<BreakerBlock, BreakerBlockFilter> {
  readonly name = 'breakerBlock';

  constructor(
    symbol: string,
    config: TimeframeConfig,
    private readonly source: OrderBlockSource,
    options: PluginOptions = {}
  ) {
    super(symbol, config, options);
  }

  detect(candles: Candle[]): BreakerBlock[] {
    const last = candles[candles.length - 1];
    if (!last) return [];

    const found: BreakerBlock[] = [];
    for (const block of this.source.getBroken()) {
      const bias = block.bias === 'bullish' ? 'bearish' : 'bullish';
      const id = `${this.symbol}_${this.timeframe}_breaker_${bias}_${block.createdTs}`;
      if (this.patterns.has(id)) continue;

      found.push({
        id,
        createdTs: block.createdTs,
        bias,
        originalBias: block.bias,
        priceLow: block.priceLow,
        priceHigh: block.priceHigh,
        volume: block.volume,
        strength: block.strength,
        brokenTs: block.brokenTs ?? last.openTs,
        testCount: 0,
        lastTestTs: null,
        isInvalidated: false,
      });
    }
    return found;
  }

  /**
   * Count retests of each breaker. A close back through the far side
   * (below a bullish breaker, above a bearish one) invalidates it.
   */
  update(candles: Candle[], _price: number): void {
    const recent = candles.slice(-UPDATE_WINDOW);

    for (const breaker of this.patterns.values()) {
      if (breaker.isInvalidated) continue;

      for (const candle of recent) {
        if (candle.openTs <= breaker.brokenTs) continue;
        if (breaker.lastTestTs !== null && candle.openTs <= breaker.lastTestTs) continue;

        if (candle.low <= breaker.priceHigh && candle.high >= breaker.priceLow) {
          breaker.testCount++;
          breaker.lastTestTs = candle.openTs;
        }

        const invalid =
          breaker.bias === 'bullish' ? candle.close < breaker.priceLow : candle.close > breaker.priceHigh;
        if (invalid) {
          breaker.isInvalidated = true;
          break;
        }
      }
    }
  }

  get(filter: BreakerBlockFilter = {}): BreakerBlock[] {
    const { bias, onlyActive = true } = filter;
    return this.select((b) => (!bias || b.bias === bias) && (!onlyActive || !b.isInvalidated)).sort(
      (a, b) => b.brokenTs - a.brokenTs
    );
  }

  toZone(breaker: BreakerBlock, ctx: ZoneContext): LiquidityZone {
    return createZone({
      id: breaker.id,
      symbol: ctx.symbol,
      timeframe: ctx.timeframe,
      kind: 'breaker-block',
      bias: breaker.bias,
      priceLow: breaker.priceLow,
      priceHigh: breaker.priceHigh,
      createdTs: breaker.createdTs,
      strength: breaker.strength,
      volume: breaker.volume,
    });
  }

  protected statusOf(breaker: BreakerBlock): PatternStatus {
    return breaker.isInvalidated ? 'invalidated' : 'active';
  }

  protected prune(): void {
    if (this.patterns.size <= MAX_BREAKERS) return;
    const ordered = [...this.patterns.values()].sort(
      (a, b) => Number(a.isInvalidated) - Number(b.isInvalidated) || b.brokenTs - a.brokenTs
    );
    this.retain(ordered.slice(0, MAX_BREAKERS));
  }
}
