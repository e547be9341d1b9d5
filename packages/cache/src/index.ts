/**
 * @strata/cache
 *
 * Redis client and the sorted-set candle store
 */

export * from './client';
export * from './keys';
export * from './strategies/candle-cache';
