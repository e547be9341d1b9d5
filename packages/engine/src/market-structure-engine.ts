import { EventEmitter } from 'events';
import { HARDCODED_CONFIG, type Candle, type CandleStore, type SyncStateSnapshot, type Timeframe } from '@strata/schemas';
import { CandleSyncService, ForwardBackfillService, type BackfillOutcome, type SymbolTimeframe } from '@strata/exchange-core';
import { LiquidityMap, type RefreshReport } from '@strata/liquidity';
import { createLogger, type Logger } from '@strata/utils';
import { CandleWindow } from './candle-window';
import type { EngineEvents, IngestResult, MarketStructureEngineOptions, TrendProvider } from './types';

const pairKey = (symbol: string, timeframe: Timeframe) => `${symbol}:${timeframe}`;

/**
 * Market Structure Engine
 *
 * Feeds closed candles through gap-aware sequencing into a rolling window
 * per (symbol, timeframe), then refreshes that symbol's liquidity map.
 * Gaps are recovered in the background and merged into the window when
 * the backfill lands.
 *
 * @example
 * const engine = new MarketStructureEngine({ symbols: ['BTCUSDT'], timeframes: ['1m', '5m'], fetcher, store });
 * await engine.start();
 * const { sync, refresh } = engine.ingest(candle);
 */
export class MarketStructureEngine extends EventEmitter<EngineEvents> {
  readonly symbols: string[];
  readonly timeframes: Timeframe[];

  private readonly sync: CandleSyncService;
  private readonly store: CandleStore;
  private readonly maps = new Map<string, LiquidityMap>();
  private readonly windows = new Map<string, CandleWindow>();
  private readonly trendProvider: TrendProvider | undefined;
  private readonly logger: Logger;
  private readonly pendingWrites = new Set<Promise<void>>();

  constructor(options: MarketStructureEngineOptions) {
    super();
    this.symbols = [...new Set(options.symbols)];
    this.timeframes = [...new Set(options.timeframes)];
    this.store = options.store;
    this.trendProvider = options.trendProvider;
    this.logger = options.logger ?? createLogger('engine');

    const backfill = new ForwardBackfillService(options.fetcher, options.store, {
      maxBatchSize: options.maxBackfillBatch,
      logger: options.logger?.child({ component: 'backfill' }),
    });
    this.sync = new CandleSyncService({
      backfill,
      logger: options.logger?.child({ component: 'sync' }),
    });
    this.sync.on('backfill:complete', (outcome) => this.onBackfillComplete(outcome));

    const windowSize = options.windowSize ?? HARDCODED_CONFIG.engine.windowSize;
    for (const symbol of this.symbols) {
      this.maps.set(symbol, new LiquidityMap({
        symbol,
        timeframes: this.timeframes,
        configs: options.liquidity?.configs,
        plugins: options.liquidity?.plugins,
        logger: options.logger?.child({ component: 'liquidity', symbol }),
      }));
      for (const timeframe of this.timeframes) {
        this.sync.register(symbol, timeframe);
        this.windows.set(pairKey(symbol, timeframe), new CandleWindow(windowSize));
      }
    }
  }

  /**
   * Seed sequencing from the store and warm each window with recent candles
   */
  async start(): Promise<void> {
    const pairs = this.pairs();
    await this.sync.seedFromStore(this.store, pairs);

    await Promise.all(
      pairs.map(async ({ symbol, timeframe }) => {
        const window = this.requireWindow(symbol, timeframe);
        try {
          window.load(await this.store.getRecentCandles(symbol, timeframe, window.capacity));
        } catch (error) {
          this.logger.warn({
            event: 'window_load_failed',
            symbol,
            timeframe,
            error: String(error),
          }, `Could not load recent candles for ${symbol} ${timeframe}`);
        }
      })
    );

    this.logger.info({ event: 'engine_started', symbols: this.symbols, timeframes: this.timeframes }, 'Engine started');
  }

  /**
   * Sequence one closed candle, persist it and refresh zones
   *
   * Never throws for bad input. Persistence runs in the background; its
   * failures are logged.
   */
  ingest(candle: Candle): IngestResult {
    const { symbol, timeframe } = candle;
    const window = this.windows.get(pairKey(symbol, timeframe));
    const map = this.maps.get(symbol);
    if (!window || !map) {
      this.logger.warn({ event: 'candle_untracked', symbol, timeframe }, `Ignoring candle for untracked ${symbol} ${timeframe}`);
      return {
        sync: { status: 'rejected-invalid', openTs: candle.openTs, reason: `untracked pair ${symbol} ${timeframe}` },
      };
    }

    const sync = this.sync.onClosedCandle(symbol, timeframe, candle);
    if (sync.status === 'rejected-stale' || sync.status === 'rejected-invalid') {
      return { sync };
    }

    window.upsert(candle);
    this.persist(candle);

    if (sync.status === 'duplicate') {
      return { sync };
    }

    const refresh = this.refresh(map, timeframe, window, candle.close);
    return refresh ? { sync, refresh } : { sync };
  }

  /**
   * Resolve once in-flight backfills and candle writes have settled
   */
  async drain(): Promise<void> {
    await this.sync.drain();
    while (this.pendingWrites.size > 0) {
      await Promise.all([...this.pendingWrites]);
    }
  }

  getLiquidityMap(symbol: string): LiquidityMap | undefined {
    return this.maps.get(symbol);
  }

  /** Window contents, oldest first */
  getWindow(symbol: string, timeframe: Timeframe): Candle[] {
    return this.windows.get(pairKey(symbol, timeframe))?.toArray() ?? [];
  }

  getSyncState(symbol: string, timeframe: Timeframe): SyncStateSnapshot | null {
    return this.sync.get(symbol, timeframe)?.snapshot() ?? null;
  }

  /**
   * Observe raw sequencing outcomes (gaps, rejections, backfill results)
   */
  get syncService(): CandleSyncService {
    return this.sync;
  }

  private refresh(map: LiquidityMap, timeframe: Timeframe, window: CandleWindow, price: number): RefreshReport | undefined {
    const trend = this.trendProvider?.(map.symbol, timeframe);
    try {
      const report = map.onCandleClose(timeframe, window.toArray(), price, trend);
      this.emit('zones:refreshed', map.symbol, report);
      return report;
    } catch (error) {
      this.logger.error({
        event: 'refresh_failed',
        symbol: map.symbol,
        timeframe,
        error: String(error),
      }, `Zone refresh failed for ${map.symbol} ${timeframe}`);
      return undefined;
    }
  }

  private persist(candle: Candle): void {
    const write = this.store.addCandle(candle).catch((error: unknown) => {
      this.logger.error({
        event: 'candle_persist_failed',
        symbol: candle.symbol,
        timeframe: candle.timeframe,
        openTs: candle.openTs,
        error: String(error),
      }, `Failed to persist ${candle.symbol} ${candle.timeframe} candle`);
    });

    this.pendingWrites.add(write);
    void write.finally(() => this.pendingWrites.delete(write));
  }

  private onBackfillComplete(outcome: BackfillOutcome): void {
    const { symbol, timeframe } = outcome.request;
    const window = this.windows.get(pairKey(symbol, timeframe));
    if (!window || outcome.recovered.length === 0) return;

    window.load(outcome.recovered);
    this.logger.info({
      event: 'window_backfilled',
      symbol,
      timeframe,
      recovered: outcome.recovered.length,
    }, `Merged ${outcome.recovered.length} recovered candles into ${symbol} ${timeframe}`);
    this.emit('window:backfilled', symbol, timeframe, outcome.recovered);
  }

  private pairs(): SymbolTimeframe[] {
    return this.symbols.flatMap((symbol) => this.timeframes.map((timeframe) => ({ symbol, timeframe })));
  }

  private requireWindow(symbol: string, timeframe: Timeframe): CandleWindow {
    const window = this.windows.get(pairKey(symbol, timeframe));
    if (!window) throw new Error(`No candle window for ${symbol} ${timeframe}`);
    return window;
  }
}
