import { STRENGTH_RANK, type Candle, type LiquidityZone, type ZoneStrength } from '@strata/schemas';
import { mean } from '@strata/utils';
import { createZone } from '../zones/zone';
import { BasePlugin } from './base-plugin';
import type { PatternStatus, ZoneContext } from './types';

export type BlockBias = 'bullish' | 'bearish';

/**
 * Last opposite-colour candle before a displacement move
 */
export interface OrderBlock {
  id: string;
  /** Open time of the block candle */
  createdTs: number;
  bias: BlockBias;
  priceLow: number;
  priceHigh: number;
  volume: number;
  strength: ZoneStrength;
  /** Open time of the displacement candle */
  displacementTs: number;
  touchCount: number;
  lastTestTs: number | null;
  isMitigated: boolean;
  isBroken: boolean;
  brokenTs: number | null;
}

export interface OrderBlockFilter {
  bias?: BlockBias;
  onlyUnmitigated?: boolean;
  includeBroken?: boolean;
  minStrength?: ZoneStrength;
}

/**
 * Read-only view the breaker plugin builds on
 */
export interface OrderBlockSource {
  getBroken(): OrderBlock[];
}

const MIN_CANDLES = 20;
const MAX_LOOKBACK = 100;
const DISPLACEMENT_FACTOR = 1.5;
const BLOCK_SEARCH = 9;
const SKIP_AFTER_HIT = 5;
const UPDATE_WINDOW = 20;
const MAX_BLOCKS = 100;

function isBullishCandle(candle: Candle): boolean {
  return candle.close > candle.open;
}

function isBearishCandle(candle: Candle): boolean {
  return candle.close < candle.open;
}

function strengthOf(movePct: number): ZoneStrength {
  const score = Math.min(Math.abs(movePct) * 50, 1);
  if (score > 0.7) return 'strong';
  if (score > 0.4) return 'moderate';
  return 'weak';
}

export class OrderBlockPlugin extends BasePlugin<OrderBlock, OrderBlockFilter> implements OrderBlockSource {
  readonly name = 'orderBlock';

  detect(candles: Candle[]): OrderBlock[] {
    if (candles.length < MIN_CANDLES) return [];

    const recent = candles.slice(-MAX_LOOKBACK);
    const threshold = mean(recent.map((c) => Math.abs(c.close - c.open))) * DISPLACEMENT_FACTOR;
    const found: OrderBlock[] = [];

    let i = 1;
    while (i < recent.length - 1) {
      const candle = recent[i];
      const body = Math.abs(candle.close - candle.open);
      const bias: BlockBias | null = isBullishCandle(candle) ? 'bullish' : isBearishCandle(candle) ? 'bearish' : null;
      let hit = false;

      if (body > threshold && bias !== null) {
        const isOpposite = bias === 'bullish' ? isBearishCandle : isBullishCandle;

        for (let j = i - 1; j >= Math.max(1, i - BLOCK_SEARCH); j--) {
          const block = recent[j];
          if (!isOpposite(block)) continue;

          const id = `${this.symbol}_${this.timeframe}_ob_${bias}_${block.openTs}`;
          if (!this.patterns.has(id)) {
            found.push({
              id,
              createdTs: block.openTs,
              bias,
              priceLow: block.low,
              priceHigh: block.high,
              volume: block.volume,
              strength: strengthOf((candle.close - candle.open) / candle.open),
              displacementTs: candle.openTs,
              touchCount: 0,
              lastTestTs: null,
              isMitigated: false,
              isBroken: false,
              brokenTs: null,
            });
          }
          hit = true;
          break;
        }
      }

      i += hit ? SKIP_AFTER_HIT + 1 : 1;
    }

    return found;
  }

  update(candles: Candle[], _price: number): void {
    const recent = candles.slice(-UPDATE_WINDOW);

    for (const block of this.patterns.values()) {
      if (block.isBroken) continue;

      for (const candle of recent) {
        if (candle.openTs <= block.displacementTs) continue;
        if (block.lastTestTs !== null && candle.openTs <= block.lastTestTs) continue;

        const probe = block.bias === 'bullish' ? candle.low : candle.high;
        if (probe >= block.priceLow && probe <= block.priceHigh) {
          block.isMitigated = true;
          block.touchCount++;
          block.lastTestTs = candle.openTs;
        }

        const broken =
          block.bias === 'bullish' ? candle.close < block.priceLow : candle.close > block.priceHigh;
        if (broken) {
          block.isBroken = true;
          block.brokenTs = candle.openTs;
          this.logger.debug({
            event: 'order_block_broken',
            symbol: this.symbol,
            timeframe: this.timeframe,
            id: block.id,
          }, 'Order block broken');
          break;
        }
      }
    }
  }

  get(filter: OrderBlockFilter = {}): OrderBlock[] {
    const { bias, onlyUnmitigated = false, includeBroken = false, minStrength } = filter;
    return this.select((block) => {
      if (bias && block.bias !== bias) return false;
      if (onlyUnmitigated && block.isMitigated) return false;
      if (!includeBroken && block.isBroken) return false;
      if (minStrength && STRENGTH_RANK[block.strength] < STRENGTH_RANK[minStrength]) return false;
      return true;
    }).sort((a, b) => b.createdTs - a.createdTs);
  }

  getBroken(): OrderBlock[] {
    return this.select((block) => block.isBroken);
  }

  toZone(block: OrderBlock, ctx: ZoneContext): LiquidityZone {
    return createZone({
      id: block.id,
      symbol: ctx.symbol,
      timeframe: ctx.timeframe,
      kind: 'order-block',
      bias: block.bias,
      priceLow: block.priceLow,
      priceHigh: block.priceHigh,
      createdTs: block.createdTs,
      strength: block.strength,
      volume: block.volume,
    });
  }

  protected statusOf(block: OrderBlock): PatternStatus {
    if (block.isBroken) return 'invalidated';
    return block.isMitigated ? 'mitigated' : 'active';
  }

  protected prune(): void {
    if (this.patterns.size <= MAX_BLOCKS) return;
    const ordered = [...this.patterns.values()].sort(
      (a, b) => Number(a.isMitigated) - Number(b.isMitigated) || b.createdTs - a.createdTs
    );
    this.retain(ordered.slice(0, MAX_BLOCKS));
  }
}
