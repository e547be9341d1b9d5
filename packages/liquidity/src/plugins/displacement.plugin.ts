import type { Candle } from '@strata/schemas';
import { mean } from '@strata/utils';
import { BasePlugin } from './base-plugin';

export type DisplacementDirection = 'bullish' | 'bearish';

/**
 * Run of consecutive same-direction candles with large bodies on
 * above-baseline volume
 */
export interface Displacement {
  id: string;
  /** Open time of the first candle in the run */
  createdTs: number;
  direction: DisplacementDirection;
  /** Open of the first candle */
  startPrice: number;
  /** Close of the last candle */
  endPrice: number;
  startTs: number;
  endTs: number;
  candleCount: number;
  totalMove: number;
  /** totalMove as a percentage of startPrice */
  movePct: number;
  avgVolume: number;
  /** avgVolume over the baseline volume */
  volumeSurgeRatio: number;
}

export interface DisplacementFilter {
  direction?: DisplacementDirection;
  minCandles?: number;
}

export type DisplacementMetric = 'movePct' | 'volumeSurgeRatio' | 'candleCount';

const MIN_CANDLES = 3;
const MIN_VOLUME_RATIO = 1.5;
const MIN_BODY_PCT = 0.6;
const VOLUME_LOOKBACK = 20;
const MAX_DISPLACEMENTS = 50;

/**
 * Tracks displacement moves within the current candle window
 *
 * The baseline is the mean volume of the last `VOLUME_LOOKBACK` candles.
 * A run still extending at the newest candle is reported once it ends,
 * so each displacement is stored with its final length. Displacements
 * have no zone of their own.
 */
export class DisplacementPlugin extends BasePlugin<Displacement, DisplacementFilter> {
  readonly name = 'displacement';

  detect(candles: Candle[]): Displacement[] {
    if (candles.length < MIN_CANDLES + VOLUME_LOOKBACK) return [];

    const baseline = mean(candles.slice(-VOLUME_LOOKBACK).map((c) => c.volume));
    const qualifies = (candle: Candle) => isDisplacementCandle(candle, baseline);
    const found: Displacement[] = [];

    let i = VOLUME_LOOKBACK;
    while (i < candles.length) {
      const first = candles[i];
      if (!qualifies(first)) {
        i++;
        continue;
      }

      const bullish = first.close > first.open;
      let end = i;
      while (end + 1 < candles.length) {
        const next = candles[end + 1];
        if (next.close > next.open !== bullish || !qualifies(next)) break;
        end++;
      }
      const count = end - i + 1;

      // Still running at the newest candle
      if (end === candles.length - 1) break;

      if (count >= MIN_CANDLES) {
        const displacement = this.build(candles.slice(i, end + 1), bullish, baseline);
        if (!this.patterns.has(displacement.id)) found.push(displacement);
        i = end + 1;
      } else {
        i++;
      }
    }

    return found;
  }

  /** Forget displacements that started before the window */
  update(candles: Candle[], _price: number): void {
    const first = candles[0];
    if (!first) return;
    const kept = [...this.patterns.values()].filter((d) => d.startTs >= first.openTs);
    if (kept.length !== this.patterns.size) this.retain(kept);
  }

  /** Newest first, by end time */
  get(filter: DisplacementFilter = {}): Displacement[] {
    const { direction, minCandles } = filter;
    return this.select(
      (d) => (!direction || d.direction === direction) && (minCandles === undefined || d.candleCount >= minCandles)
    ).sort((a, b) => b.endTs - a.endTs);
  }

  toZone(): null {
    return null;
  }

  protected prune(): void {
    if (this.patterns.size <= MAX_DISPLACEMENTS) return;
    const newest = [...this.patterns.values()].sort((a, b) => b.endTs - a.endTs).slice(0, MAX_DISPLACEMENTS);
    this.retain(newest.reverse());
  }

  private build(run: Candle[], bullish: boolean, baseline: number): Displacement {
    const first = run[0];
    const last = run[run.length - 1];
    const direction: DisplacementDirection = bullish ? 'bullish' : 'bearish';
    const totalMove = Math.abs(last.close - first.open);
    const avgVolume = mean(run.map((c) => c.volume));

    return {
      id: `${this.symbol}_${this.timeframe}_disp_${direction}_${first.openTs}`,
      createdTs: first.openTs,
      direction,
      startPrice: first.open,
      endPrice: last.close,
      startTs: first.openTs,
      endTs: last.openTs,
      candleCount: run.length,
      totalMove,
      movePct: (totalMove / first.open) * 100,
      avgVolume,
      volumeSurgeRatio: baseline > 0 ? avgVolume / baseline : 1,
    };
  }
}

/** Volume at least 1.5x baseline and a body of at least 60% of the range */
function isDisplacementCandle(candle: Candle, baseline: number): boolean {
  if (candle.volume < baseline * MIN_VOLUME_RATIO) return false;
  const range = candle.high - candle.low;
  if (range === 0) return false;
  return Math.abs(candle.close - candle.open) / range >= MIN_BODY_PCT;
}

/**
 * Highest-scoring displacement by `metric`; the earliest entry wins ties
 *
 * @returns null for an empty list
 */
export function strongestDisplacement(
  displacements: Displacement[],
  metric: DisplacementMetric = 'movePct'
): Displacement | null {
  let best: Displacement | null = null;
  for (const d of displacements) {
    if (!best || d[metric] > best[metric]) best = d;
  }
  return best;
}
