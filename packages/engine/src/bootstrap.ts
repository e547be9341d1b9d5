import type { EnvConfig } from '@strata/schemas';
import { BinanceRestClient } from '@strata/binance-client';
import { CandleCacheStrategy, createRedisClient, testRedisConnection, type RedisClient } from '@strata/cache';
import { createLogger, validateEnv } from '@strata/utils';
import { MarketStructureEngine } from './market-structure-engine';
import type { TrendProvider } from './types';

export interface EngineRuntime {
  engine: MarketStructureEngine;
  redis: RedisClient;
  /** Check Redis, then seed sync state and windows */
  start: () => Promise<void>;
  /** Wait for pending work, then close the Redis connection */
  shutdown: () => Promise<void>;
}

/**
 * Build an engine backed by Redis and the Binance REST API
 *
 * @param env - Validated configuration (default: validateEnv())
 */
export function createEngineFromEnv(env: EnvConfig = validateEnv(), trendProvider?: TrendProvider): EngineRuntime {
  const logger = createLogger('engine');
  const redis = createRedisClient(env);

  const engine = new MarketStructureEngine({
    symbols: env.STRATA_SYMBOLS,
    timeframes: env.STRATA_TIMEFRAMES,
    fetcher: new BinanceRestClient({ baseUrl: env.BINANCE_API_URL }),
    store: new CandleCacheStrategy(redis),
    maxBackfillBatch: env.BACKFILL_LIMIT_MAX,
    trendProvider,
    logger,
  });

  const start = async () => {
    await testRedisConnection(redis);
    await engine.start();
  };

  const shutdown = async () => {
    await engine.drain();
    await redis.quit();
    logger.info({ event: 'engine_stopped' }, 'Engine stopped');
  };

  return { engine, redis, start, shutdown };
}
