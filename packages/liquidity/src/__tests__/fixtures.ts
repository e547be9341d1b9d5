import type { Candle, LiquidityZone, Timeframe } from '@strata/schemas';
import { timeframeToSeconds } from '@strata/utils';
import { createZone, type ZoneCandidate } from '../zones/zone';

export const BASE_TS = 1704067200;

export interface Bar {
  open: number;
  high: number;
  low: number;
  close: number;
  volume?: number;
}

export function tsAt(index: number, timeframe: Timeframe = '1m'): number {
  return BASE_TS + index * timeframeToSeconds(timeframe);
}

export function bar(index: number, values: Bar, timeframe: Timeframe = '1m'): Candle {
  const openTs = tsAt(index, timeframe);
  return {
    symbol: 'BTCUSDT',
    timeframe,
    openTs,
    closeTs: openTs + timeframeToSeconds(timeframe) - 1,
    open: values.open,
    high: values.high,
    low: values.low,
    close: values.close,
    volume: values.volume ?? 10,
    isClosed: true,
  };
}

export function bars(values: Bar[], timeframe: Timeframe = '1m'): Candle[] {
  return values.map((v, i) => bar(i, v, timeframe));
}

export function zone(overrides: Partial<ZoneCandidate> & Pick<ZoneCandidate, 'id' | 'priceLow' | 'priceHigh'>): LiquidityZone {
  return createZone({
    symbol: 'BTCUSDT',
    timeframe: '5m',
    kind: 'support',
    bias: 'bullish',
    createdTs: 0,
    ...overrides,
  });
}

/**
 * Flat series (o/c 100, h 100.5, l 99.5, v 10) with one volume-backed
 * swing high at index 15 (h 100.8, c 100.7, v 100)
 */
export function swingHighSeries(timeframe: Timeframe = '1m', pivotVolume = 100): Candle[] {
  const values: Bar[] = [];
  for (let i = 0; i < 30; i++) {
    values.push(
      i === 15
        ? { open: 100, high: 100.8, low: 99.9, close: 100.7, volume: pivotVolume }
        : { open: 100, high: 100.5, low: 99.5, close: 100 }
    );
  }
  return bars(values, timeframe);
}
