import type {
  BackfillRequest,
  Candle,
  GapRange,
  SyncResult,
  SyncStateSnapshot,
  Timeframe,
} from '@strata/schemas';
import { timeframeToSeconds } from '@strata/utils';
import { CandleSyncError } from '../errors';

/**
 * Sequencing state for one symbol/timeframe stream
 *
 * Tracks the open time of the last accepted candle and classifies each
 * newly closed candle as in-sequence, duplicate, gap or stale. The last
 * open time is only written by `seed()`, `resync()` and an accepted
 * candle; nothing outside this class can reach it.
 */
export class CandleSync {
  readonly intervalSeconds: number;

  #lastOpenTs: number | null = null;

  constructor(
    readonly symbol: string,
    readonly timeframe: Timeframe
  ) {
    this.intervalSeconds = timeframeToSeconds(timeframe);
  }

  /**
   * Set the last known-good open time, typically from persisted storage at startup
   *
   * @throws CandleSyncError for a negative or fractional timestamp
   */
  seed(ts: number): void {
    this.transition(ts);
  }

  /**
   * Explicit reset to a new last known-good open time
   */
  resync(ts: number): void {
    this.transition(ts);
  }

  isSeeded(): boolean {
    return this.#lastOpenTs !== null;
  }

  snapshot(): SyncStateSnapshot {
    return {
      symbol: this.symbol,
      timeframe: this.timeframe,
      intervalSeconds: this.intervalSeconds,
      lastOpenTs: this.#lastOpenTs,
    };
  }

  /**
   * Classify a closed candle and advance state when it is accepted
   */
  onClosedCandle(candle: Candle): SyncResult {
    if (candle.symbol !== this.symbol || candle.timeframe !== this.timeframe) {
      return {
        status: 'rejected-invalid',
        openTs: candle.openTs,
        reason: `candle belongs to ${candle.symbol} ${candle.timeframe}, not ${this.symbol} ${this.timeframe}`,
      };
    }

    if (!candle.isClosed) {
      return { status: 'rejected-invalid', openTs: candle.openTs, reason: 'candle is not closed' };
    }

    const last = this.#lastOpenTs;

    // First candle of a never-seeded stream
    if (last === null) {
      this.#lastOpenTs = candle.openTs;
      return { status: 'accepted', openTs: candle.openTs, bootstrap: true };
    }

    if (candle.openTs === last) {
      return { status: 'duplicate', openTs: candle.openTs };
    }

    if (candle.openTs < last) {
      return { status: 'rejected-stale', openTs: candle.openTs, lastOpenTs: last };
    }

    const distance = candle.openTs - last;
    if (distance % this.intervalSeconds !== 0) {
      return {
        status: 'rejected-invalid',
        openTs: candle.openTs,
        reason: `openTs ${candle.openTs} is not a whole number of ${this.timeframe} intervals after ${last}`,
      };
    }

    this.#lastOpenTs = candle.openTs;

    if (distance === this.intervalSeconds) {
      return { status: 'accepted', openTs: candle.openTs, bootstrap: false };
    }

    const start = last + this.intervalSeconds;
    const gap: GapRange = {
      start,
      end: candle.openTs - this.intervalSeconds,
      missing: (candle.openTs - start) / this.intervalSeconds,
    };

    return {
      status: 'gap-detected',
      openTs: candle.openTs,
      gap,
      backfill: this.backfillRequestFor(gap),
    };
  }

  /**
   * Forward-fill request for a gap: starts at the first missing candle
   * and covers exactly `gap.missing` candles.
   */
  backfillRequestFor(gap: GapRange): BackfillRequest {
    return {
      symbol: this.symbol,
      timeframe: this.timeframe,
      startTs: gap.start,
      limit: gap.missing,
    };
  }

  private transition(ts: number): void {
    if (!Number.isInteger(ts) || ts < 0) {
      throw new CandleSyncError(
        `Invalid seed timestamp ${ts} for ${this.symbol} ${this.timeframe}`,
        this.symbol,
        this.timeframe
      );
    }
    this.#lastOpenTs = ts;
  }
}
