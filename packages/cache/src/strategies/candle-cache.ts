import { CandleSchema, HARDCODED_CONFIG, type Candle, type CandleStore, type Timeframe } from '@strata/schemas';
import { createLogger, type Logger } from '@strata/utils';
import { candleKey } from '../keys';

/**
 * Sorted-set commands the candle cache relies on. An ioredis client
 * satisfies this directly.
 */
export interface SortedSetClient {
  zadd(key: string, score: number, member: string): Promise<number>;
  zrange(key: string, start: number, stop: number): Promise<string[]>;
  zrangebyscore(key: string, min: number, max: number): Promise<string[]>;
  zremrangebyscore(key: string, min: number, max: number): Promise<number>;
  zremrangebyrank(key: string, start: number, stop: number): Promise<number>;
  zcard(key: string): Promise<number>;
  del(key: string): Promise<number>;
}

export interface CandleCacheOptions {
  /** Candles kept per series (default: HARDCODED_CONFIG.cache.maxCandles) */
  maxCandles?: number;
  logger?: Logger;
}

/**
 * Candle caching strategy using Redis sorted sets
 *
 * Candles are stored with openTs as the score, allowing time-range
 * queries and automatic ordering. Writing a candle replaces any candle
 * already stored at the same openTs.
 */
export class CandleCacheStrategy implements CandleStore {
  private readonly maxCandles: number;
  private readonly logger: Logger;

  constructor(
    private readonly redis: SortedSetClient,
    options: CandleCacheOptions = {}
  ) {
    this.maxCandles = options.maxCandles ?? HARDCODED_CONFIG.cache.maxCandles;
    this.logger = options.logger ?? createLogger('cache');
  }

  /**
   * Add a single candle to the cache
   */
  async addCandle(candle: Candle): Promise<void> {
    const validated = CandleSchema.parse(candle);
    const key = candleKey(validated.symbol, validated.timeframe);

    await this.write(key, validated);
    await this.trim(key);
  }

  /**
   * Add multiple candles, grouped per series
   *
   * Commands are issued one by one rather than pipelined so series that
   * hash to different cluster slots can share a batch.
   */
  async addCandles(candles: Candle[]): Promise<void> {
    if (candles.length === 0) return;

    const grouped = new Map<string, Candle[]>();
    for (const candle of candles) {
      const validated = CandleSchema.parse(candle);
      const key = candleKey(validated.symbol, validated.timeframe);
      const group = grouped.get(key);
      if (group) group.push(validated);
      else grouped.set(key, [validated]);
    }

    for (const [key, group] of grouped) {
      for (const candle of group) {
        await this.write(key, candle);
      }
      await this.trim(key);
      this.logger.debug({ event: 'candles_cached', key, count: group.length }, `Cached ${group.length} candles`);
    }
  }

  /**
   * Most recent candles, oldest first
   */
  async getRecentCandles(symbol: string, timeframe: Timeframe, count: number = 100): Promise<Candle[]> {
    if (count <= 0) return [];
    const results = await this.redis.zrange(candleKey(symbol, timeframe), -count, -1);
    return results.map((json) => CandleSchema.parse(JSON.parse(json)));
  }

  /**
   * Candles whose openTs lies in [start, end]
   */
  async getCandlesInRange(symbol: string, timeframe: Timeframe, start: number, end: number): Promise<Candle[]> {
    const results = await this.redis.zrangebyscore(candleKey(symbol, timeframe), start, end);
    return results.map((json) => CandleSchema.parse(JSON.parse(json)));
  }

  async getLastCandle(symbol: string, timeframe: Timeframe): Promise<Candle | null> {
    const results = await this.redis.zrange(candleKey(symbol, timeframe), -1, -1);
    if (results.length === 0) return null;
    return CandleSchema.parse(JSON.parse(results[0]));
  }

  async clearCandles(symbol: string, timeframe: Timeframe): Promise<void> {
    await this.redis.del(candleKey(symbol, timeframe));
  }

  async getCandleCount(symbol: string, timeframe: Timeframe): Promise<number> {
    return this.redis.zcard(candleKey(symbol, timeframe));
  }

  private async write(key: string, candle: Candle): Promise<void> {
    await this.redis.zremrangebyscore(key, candle.openTs, candle.openTs);
    await this.redis.zadd(key, candle.openTs, JSON.stringify(candle));
  }

  /** Keep only the newest maxCandles entries */
  private async trim(key: string): Promise<void> {
    await this.redis.zremrangebyrank(key, 0, -(this.maxCandles + 1));
  }
}
