/**
 * @strata/exchange-core
 *
 * Candle sequencing, gap detection and forward backfill
 */

// Sync
export { CandleSync } from './sync/candle-sync';
export {
  CandleSyncService,
  type CandleSyncEvents,
  type CandleSyncServiceOptions,
  type SymbolTimeframe,
} from './sync/candle-sync-service';

// Backfill
export { ForwardBackfillService } from './backfill/forward-backfill-service';
export { findMissingTimestamps, groupGapRanges } from './backfill/gap-detector';
export {
  DEFAULT_BACKFILL_BATCH_SIZE,
  type BackfillOutcome,
  type BackfillRunner,
  type ForwardBackfillOptions,
} from './backfill/types';

// Errors
export { CandleSyncError } from './errors';
