/**
 * @strata/schemas
 *
 * Single source of truth for all Zod schemas and TypeScript types
 * shared by the sync engine, the liquidity engine and their collaborators
 */

// Market data schemas
export * from './market/candle.schema';
export * from './market/liquidity.schema';
export * from './market/trend.schema';

// Engine configuration
export * from './config/timeframe-config.schema';

// Sync results
export * from './sync/sync-result.schema';

// Collaborator contracts
export * from './adapter';

// Environment and configuration schemas
export * from './env/config.schema';
