import { vi } from 'vitest';
import type { Candle, CandleFetcher, CandleStore, Timeframe } from '@strata/schemas';
import { timeframeToSeconds, type Logger } from '@strata/utils';

export function candle(openTs: number, overrides: Partial<Candle> = {}): Candle {
  const timeframe: Timeframe = overrides.timeframe ?? '1m';
  return {
    symbol: 'BTCUSDT',
    timeframe,
    openTs,
    closeTs: openTs + timeframeToSeconds(timeframe) - 1,
    open: 100,
    high: 101,
    low: 99,
    close: 100,
    volume: 10,
    isClosed: true,
    ...overrides,
  };
}

/**
 * In-memory candle store keyed by symbol and timeframe
 */
export class MemoryCandleStore implements CandleStore {
  readonly series = new Map<string, Candle[]>();

  constructor(seed: Candle[] = []) {
    for (const c of seed) this.put(c);
  }

  async getLastCandle(symbol: string, timeframe: Timeframe): Promise<Candle | null> {
    const list = this.list(symbol, timeframe);
    return list.length > 0 ? list[list.length - 1] : null;
  }

  async addCandle(c: Candle): Promise<void> {
    this.put(c);
  }

  async addCandles(candles: Candle[]): Promise<void> {
    for (const c of candles) this.put(c);
  }

  async getRecentCandles(symbol: string, timeframe: Timeframe, count: number): Promise<Candle[]> {
    return this.list(symbol, timeframe).slice(-count);
  }

  openTimes(symbol: string, timeframe: Timeframe): number[] {
    return this.list(symbol, timeframe).map((c) => c.openTs);
  }

  private list(symbol: string, timeframe: Timeframe): Candle[] {
    return this.series.get(`${symbol}:${timeframe}`) ?? [];
  }

  private put(c: Candle): void {
    const list = this.list(c.symbol, c.timeframe).filter((existing) => existing.openTs !== c.openTs);
    list.push(c);
    list.sort((a, b) => a.openTs - b.openTs);
    this.series.set(`${c.symbol}:${c.timeframe}`, list);
  }
}

/**
 * Fetcher that returns every requested candle
 */
export function completeFetcher() {
  const fetchCandles = vi.fn<CandleFetcher['fetchCandles']>(async (symbol, timeframe, startTs, limit) =>
    Array.from({ length: limit }, (_, i) => candle(startTs + i * timeframeToSeconds(timeframe), { symbol, timeframe }))
  );
  return { fetchCandles };
}

export function fakeLogger(): Logger {
  const logger: Logger = {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: () => logger,
    isLevelEnabled: () => false,
    flush: vi.fn(),
  };
  return logger;
}
