import { EventEmitter } from 'events';
import {
  CandleSchema,
  type BackfillRequest,
  type Candle,
  type CandleStore,
  type GapRange,
  type SyncResult,
  type SyncStateSnapshot,
  type Timeframe,
} from '@strata/schemas';
import { createLogger, type Logger } from '@strata/utils';
import type { BackfillOutcome, BackfillRunner } from '../backfill/types';
import { CandleSync } from './candle-sync';

type RejectedResult = Extract<SyncResult, { status: 'rejected-stale' | 'rejected-invalid' }>;

/**
 * Events emitted by CandleSyncService
 */
export type CandleSyncEvents = {
  'candle:accepted': [candle: Candle, bootstrap: boolean];
  'candle:duplicate': [candle: Candle];
  'gap:detected': [candle: Candle, gap: GapRange, request: BackfillRequest];
  'candle:rejected': [result: RejectedResult, symbol: string, timeframe: Timeframe];
  'backfill:complete': [outcome: BackfillOutcome];
  'backfill:failed': [request: BackfillRequest, error: Error];
};

export interface CandleSyncServiceOptions {
  backfill: BackfillRunner;
  logger?: Logger;
}

export interface SymbolTimeframe {
  symbol: string;
  timeframe: Timeframe;
}

const pairKey = (symbol: string, timeframe: Timeframe) => `${symbol}:${timeframe}`;

/**
 * Ingestion front door for closed candles across all symbol/timeframe pairs
 *
 * Owns one CandleSync per pair. Gaps trigger a forward backfill that runs
 * in the background; the candle that revealed the gap is accepted without
 * waiting on it.
 */
export class CandleSyncService extends EventEmitter<CandleSyncEvents> {
  private readonly syncs = new Map<string, CandleSync>();
  private readonly backfill: BackfillRunner;
  private readonly logger: Logger;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(options: CandleSyncServiceOptions) {
    super();
    this.backfill = options.backfill;
    this.logger = options.logger ?? createLogger('candles:sync');
  }

  /**
   * Get or create the sync instance for a pair
   */
  register(symbol: string, timeframe: Timeframe): CandleSync {
    const key = pairKey(symbol, timeframe);
    let sync = this.syncs.get(key);
    if (!sync) {
      sync = new CandleSync(symbol, timeframe);
      this.syncs.set(key, sync);
    }
    return sync;
  }

  get(symbol: string, timeframe: Timeframe): CandleSync | undefined {
    return this.syncs.get(pairKey(symbol, timeframe));
  }

  snapshots(): SyncStateSnapshot[] {
    return [...this.syncs.values()].map((sync) => sync.snapshot());
  }

  /**
   * Seed each pair from its latest persisted candle
   *
   * Looks up every pair exactly once. A failed lookup leaves that pair
   * unseeded; it then bootstraps from its first live candle.
   *
   * @returns Number of pairs seeded
   */
  async seedFromStore(store: Pick<CandleStore, 'getLastCandle'>, pairs: SymbolTimeframe[]): Promise<number> {
    const results = await Promise.allSettled(
      pairs.map(async ({ symbol, timeframe }) => {
        const sync = this.register(symbol, timeframe);
        const last = await store.getLastCandle(symbol, timeframe);
        if (!last) return false;
        sync.seed(last.openTs);
        return true;
      })
    );

    let seeded = 0;
    results.forEach((result, i) => {
      const { symbol, timeframe } = pairs[i];
      if (result.status === 'fulfilled') {
        if (result.value) seeded++;
        else this.logger.info({ event: 'seed_empty', symbol, timeframe }, `No persisted candles for ${symbol} ${timeframe}`);
      } else {
        this.logger.warn({
          event: 'seed_failed',
          symbol,
          timeframe,
          error: String(result.reason),
        }, `Could not seed ${symbol} ${timeframe}`);
      }
    });

    this.logger.info({ event: 'seed_complete', seeded, total: pairs.length }, `Seeded ${seeded}/${pairs.length} pairs`);
    return seeded;
  }

  /**
   * Validate and sequence one closed candle
   *
   * Never throws for bad input: schema failures come back as
   * `rejected-invalid`. Listener errors are logged, not rethrown.
   */
  onClosedCandle(symbol: string, timeframe: Timeframe, input: unknown): SyncResult {
    const parsed = CandleSchema.safeParse(input);
    if (!parsed.success) {
      const reason = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || 'candle'}: ${issue.message}`)
        .join('; ');
      const result: RejectedResult = { status: 'rejected-invalid', openTs: null, reason };
      this.reject(result, symbol, timeframe);
      return result;
    }

    const candle = parsed.data;
    const result = this.register(symbol, timeframe).onClosedCandle(candle);

    switch (result.status) {
      case 'accepted':
        this.logger.debug({
          event: 'candle_accepted',
          symbol,
          timeframe,
          openTs: candle.openTs,
          bootstrap: result.bootstrap,
        }, `Accepted ${symbol} ${timeframe} candle`);
        this.notify('candle:accepted', () => this.emit('candle:accepted', candle, result.bootstrap));
        break;

      case 'duplicate':
        this.logger.debug({ event: 'candle_duplicate', symbol, timeframe, openTs: candle.openTs }, `Duplicate ${symbol} ${timeframe} candle`);
        this.notify('candle:duplicate', () => this.emit('candle:duplicate', candle));
        break;

      case 'gap-detected':
        this.logger.warn({
          event: 'gap_detected',
          symbol,
          timeframe,
          start: result.gap.start,
          end: result.gap.end,
          missing: result.gap.missing,
        }, `Gap of ${result.gap.missing} candles on ${symbol} ${timeframe}`);
        this.dispatchBackfill(result.backfill);
        this.notify('gap:detected', () => this.emit('gap:detected', candle, result.gap, result.backfill));
        break;

      case 'rejected-stale':
      case 'rejected-invalid':
        this.reject(result, symbol, timeframe);
        break;
    }

    return result;
  }

  /**
   * Resolve once every backfill started so far has settled
   */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  private reject(result: RejectedResult, symbol: string, timeframe: Timeframe): void {
    this.logger.warn({
      event: 'candle_rejected',
      symbol,
      timeframe,
      status: result.status,
      openTs: result.openTs,
      ...(result.status === 'rejected-stale'
        ? { lastOpenTs: result.lastOpenTs }
        : { reason: result.reason }),
    }, `Rejected ${symbol} ${timeframe} candle (${result.status})`);
    this.notify('candle:rejected', () => this.emit('candle:rejected', result, symbol, timeframe));
  }

  /**
   * Run an emit so that a throwing listener is logged instead of reaching
   * the caller
   */
  private notify(event: keyof CandleSyncEvents, emit: () => void): void {
    try {
      emit();
    } catch (error) {
      this.logger.error({ event: 'listener_error', listener: event, error: String(error) }, `Listener for ${event} threw`);
    }
  }

  private dispatchBackfill(request: BackfillRequest): void {
    const task = this.runBackfill(request);

    this.inFlight.add(task);
    void task.finally(() => this.inFlight.delete(task));
  }

  private async runBackfill(request: BackfillRequest): Promise<void> {
    let outcome: BackfillOutcome;
    try {
      outcome = await this.backfill.request(request);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.logger.error({
        event: 'backfill_failed',
        symbol: request.symbol,
        timeframe: request.timeframe,
        startTs: request.startTs,
        limit: request.limit,
        error: err.message,
      }, `Backfill failed for ${request.symbol} ${request.timeframe}`);
      this.notify('backfill:failed', () => this.emit('backfill:failed', request, err));
      return;
    }

    this.notify('backfill:complete', () => this.emit('backfill:complete', outcome));
  }
}
