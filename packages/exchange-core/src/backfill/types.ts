import type { BackfillRequest, Candle } from '@strata/schemas';
import type { Logger } from '@strata/utils';

/**
 * Result of one forward-fill request
 */
export interface BackfillOutcome {
  request: BackfillRequest;
  /** Candles inside the requested range, ascending, unique by openTs */
  recovered: Candle[];
  /** Open times in the requested range the fetcher did not return */
  stillMissing: number[];
}

/**
 * Anything that can service a backfill request
 */
export interface BackfillRunner {
  request(request: BackfillRequest): Promise<BackfillOutcome>;
}

/**
 * Options for ForwardBackfillService
 */
export interface ForwardBackfillOptions {
  /** Largest `limit` passed to a single fetch (default: 1000) */
  maxBatchSize?: number;
  logger?: Logger;
}

export const DEFAULT_BACKFILL_BATCH_SIZE = 1000;
