import Redis, { type RedisOptions } from 'ioredis';
import { HARDCODED_CONFIG, type EnvConfig } from '@strata/schemas';
import { createLogger } from '@strata/utils';

const logger = createLogger('cache');

export type RedisClient = Redis;

/** Longest pause between reconnect attempts */
const MAX_RETRY_DELAY_MS = 5000;

/**
 * Connection options for the candle store's Redis
 *
 * Reconnects back off linearly and give up after
 * HARDCODED_CONFIG.redis.maxRetries attempts.
 */
export function redisOptions(config: EnvConfig): RedisOptions {
  const { maxRetries, retryDelayMs, commandTimeoutMs } = HARDCODED_CONFIG.redis;

  return {
    host: config.REDIS_HOST,
    port: config.REDIS_PORT,
    password: config.REDIS_PASSWORD,
    tls: config.REDIS_TLS ? { servername: config.REDIS_HOST } : undefined,
    maxRetriesPerRequest: maxRetries,
    commandTimeout: commandTimeoutMs,
    retryStrategy: (attempt) => {
      if (attempt > maxRetries) {
        logger.error({ event: 'redis_retries_exhausted', attempt }, 'Redis max retries reached');
        return null;
      }
      const delay = Math.min(attempt * retryDelayMs, MAX_RETRY_DELAY_MS);
      logger.warn({ event: 'redis_retry', attempt, delay }, `Redis retry attempt ${attempt}, waiting ${delay}ms`);
      return delay;
    },
  };
}

/**
 * Create a Redis client with lifecycle logging
 */
export function createRedisClient(config: EnvConfig): RedisClient {
  const target = `${config.REDIS_HOST}:${config.REDIS_PORT}${config.REDIS_TLS ? ' (TLS)' : ''}`;
  logger.info({ event: 'redis_connect', target }, `Connecting to Redis at ${target}`);

  const redis = new Redis(redisOptions(config));
  redis
    .on('ready', () => logger.info({ event: 'redis_ready' }, 'Redis client ready'))
    .on('reconnecting', () => logger.info({ event: 'redis_reconnecting' }, 'Redis client reconnecting'))
    .on('close', () => logger.warn({ event: 'redis_closed' }, 'Redis connection closed'))
    .on('error', (error: Error) => logger.error({ event: 'redis_error', err: error.message }, 'Redis client error'));

  return redis;
}

/**
 * PING the server, throwing if it does not answer PONG
 */
export async function testRedisConnection(redis: { ping(): Promise<string> }): Promise<void> {
  let reply: string;
  try {
    reply = await redis.ping();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error({ event: 'redis_ping_failed', error: message }, 'Redis connection test FAILED');
    throw new Error(`Redis connection failed: ${message}`);
  }

  if (reply !== 'PONG') {
    logger.error({ event: 'redis_ping_failed', reply }, 'Redis connection test FAILED');
    throw new Error(`Redis connection failed: Unexpected PING response: ${reply}`);
  }
  logger.info({ event: 'redis_ping_ok' }, 'Redis connection test passed');
}
