import type { BackfillRequest, Candle, CandleFetcher, CandleSink } from '@strata/schemas';
import {
  createLogger,
  formatTimestamp,
  normalizeCandles,
  timeframeToSeconds,
  type Logger,
} from '@strata/utils';
import { findMissingTimestamps, groupGapRanges } from './gap-detector';
import {
  DEFAULT_BACKFILL_BATCH_SIZE,
  type BackfillOutcome,
  type BackfillRunner,
  type ForwardBackfillOptions,
} from './types';

/**
 * Forward-fill service for gaps detected on live candle streams
 *
 * Fetches from the first missing candle forward, never from "now", so the
 * recovered range is the range that was missed. Requests larger than the
 * fetcher's page size are split into consecutive pages.
 *
 * Remaining holes are logged and reported in the outcome, not retried;
 * retry policy belongs to the fetcher. Sync state is never touched here.
 */
export class ForwardBackfillService implements BackfillRunner {
  private readonly fetcher: CandleFetcher;
  private readonly sink: CandleSink | null;
  private readonly maxBatchSize: number;
  private readonly logger: Logger;

  constructor(fetcher: CandleFetcher, sink?: CandleSink | null, options: ForwardBackfillOptions = {}) {
    this.fetcher = fetcher;
    this.sink = sink ?? null;
    this.maxBatchSize = options.maxBatchSize ?? DEFAULT_BACKFILL_BATCH_SIZE;
    this.logger = options.logger ?? createLogger('candles:backfill');

    if (!Number.isInteger(this.maxBatchSize) || this.maxBatchSize < 1) {
      throw new Error(`Invalid backfill batch size: ${this.maxBatchSize}`);
    }
  }

  async request(request: BackfillRequest): Promise<BackfillOutcome> {
    const { symbol, timeframe, startTs, limit } = request;
    const interval = timeframeToSeconds(timeframe);
    const endExclusive = startTs + limit * interval;

    this.logger.info({
      event: 'backfill_start',
      symbol,
      timeframe,
      startTs,
      limit,
    }, `Backfilling ${symbol} ${timeframe}: ${limit} candles from ${formatTimestamp(startTs)}`);

    const fetched: Candle[] = [];
    for (let offset = 0; offset < limit; offset += this.maxBatchSize) {
      const pageStart = startTs + offset * interval;
      const pageLimit = Math.min(this.maxBatchSize, limit - offset);
      const page = await this.fetcher.fetchCandles(symbol, timeframe, pageStart, pageLimit);
      fetched.push(...page);
    }

    const recovered = normalizeCandles(
      fetched.filter(
        (c) =>
          c.symbol === symbol &&
          c.timeframe === timeframe &&
          c.openTs >= startTs &&
          c.openTs < endExclusive
      )
    );

    const stillMissing = findMissingTimestamps(recovered, timeframe, startTs, endExclusive - interval);
    if (stillMissing.length > 0) {
      this.logger.warn({
        event: 'backfill_incomplete',
        symbol,
        timeframe,
        missing: stillMissing.length,
        ranges: groupGapRanges(stillMissing, timeframe),
      }, `Backfill left ${stillMissing.length} candles missing for ${symbol} ${timeframe}`);
    }

    if (this.sink && recovered.length > 0) {
      await this.sink.addCandles(recovered);
    }

    this.logger.info({
      event: 'backfill_complete',
      symbol,
      timeframe,
      recovered: recovered.length,
      stillMissing: stillMissing.length,
    }, `Backfill complete for ${symbol} ${timeframe}: ${recovered.length}/${limit}`);

    return { request, recovered, stillMissing };
  }
}
