import { z } from 'zod';
import { TimeframeSchema } from '../market/candle.schema';

/**
 * Comma-separated list -> trimmed, non-empty entries
 */
const csv = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((val) =>
      val
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0)
    );

/**
 * Environment configuration schema
 * Validates all environment variables on engine startup
 */
export const EnvConfigSchema = z.object({
  // Node environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Tracked markets
  STRATA_SYMBOLS: csv('BTCUSDT').pipe(z.array(z.string().min(1)).min(1)),
  STRATA_TIMEFRAMES: csv('1m,5m,15m,1h').pipe(z.array(TimeframeSchema).min(1)),

  // Redis connection
  REDIS_HOST: z.string().min(1).default('localhost'),
  REDIS_PORT: z.string().transform((val) => parseInt(val, 10)).pipe(z.number().int().positive()).default('6379'),
  REDIS_PASSWORD: z.string().optional(),
  REDIS_TLS: z.enum(['true', 'false']).default('false').transform((val) => val === 'true'),

  // Binance REST
  BINANCE_API_URL: z.string().url().default('https://api.binance.com'),

  // Largest forward-fill batch requested in one REST call
  BACKFILL_LIMIT_MAX: z.string().transform((val) => parseInt(val, 10)).pipe(z.number().int().min(1).max(1000)).default('1000'),
});

/**
 * Validated environment configuration type
 */
export type EnvConfig = z.infer<typeof EnvConfigSchema>;

/**
 * Hardcoded configuration values (not from environment variables)
 */
export const HARDCODED_CONFIG = {
  // Redis configuration
  redis: {
    maxRetries: 3,
    retryDelayMs: 1000,
    commandTimeoutMs: 5000,
  },

  // Candle cache
  cache: {
    /** Candles retained per (symbol, timeframe) sorted set */
    maxCandles: 1000,
  },

  // In-memory candle window fed to the liquidity map
  engine: {
    windowSize: 500,
  },
} as const;

/**
 * Helper type for hardcoded config
 */
export type HardcodedConfig = typeof HARDCODED_CONFIG;
