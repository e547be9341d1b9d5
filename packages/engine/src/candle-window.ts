import type { Candle } from '@strata/schemas';
import { normalizeCandles, upsertCandle } from '@strata/utils';

/**
 * Bounded, ascending candle buffer for one (symbol, timeframe)
 *
 * Writing a candle whose openTs is already present replaces it. Once full,
 * the oldest candles fall off.
 */
export class CandleWindow {
  private candles: Candle[] = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Invalid candle window capacity: ${capacity}`);
    }
  }

  get size(): number {
    return this.candles.length;
  }

  get last(): Candle | null {
    return this.candles.length > 0 ? this.candles[this.candles.length - 1] : null;
  }

  upsert(candle: Candle): void {
    this.candles = upsertCandle(this.candles, candle);
    if (this.candles.length > this.capacity) {
      this.candles = this.candles.slice(-this.capacity);
    }
  }

  /** Merge a batch (e.g. recovered candles) into the window */
  load(candles: Candle[]): void {
    if (candles.length === 0) return;
    this.candles = normalizeCandles([...this.candles, ...candles]).slice(-this.capacity);
  }

  toArray(): Candle[] {
    return [...this.candles];
  }
}
