import type { Candle } from '@strata/schemas';

/** 2024-01-01T00:00:00Z */
export const BASE_TS = 1704067200;

export function makeCandle(openTs: number, overrides: Partial<Candle> = {}): Candle {
  return {
    symbol: 'BTCUSDT',
    timeframe: '1m',
    openTs,
    closeTs: openTs + 59,
    open: 100,
    high: 101,
    low: 99,
    close: 100.5,
    volume: 10,
    isClosed: true,
    ...overrides,
  };
}
