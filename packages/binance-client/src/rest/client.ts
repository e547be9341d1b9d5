import { z } from 'zod';
import { CandleSchema, type Candle, type CandleFetcher, type Timeframe } from '@strata/schemas';
import { createLogger, normalizeCandles, type Logger } from '@strata/utils';
import { BinanceApiError } from '../errors';

/** Largest page /api/v3/klines serves */
export const MAX_KLINES_LIMIT = 1000;

/**
 * Kline row: [openTime, open, high, low, close, volume, closeTime, ...]
 * Prices and volume arrive as decimal strings, times as milliseconds.
 */
const KlineSchema = z
  .tuple([z.number(), z.string(), z.string(), z.string(), z.string(), z.string(), z.number()])
  .rest(z.unknown());

const KlinesResponseSchema = z.array(KlineSchema);

export type Kline = z.infer<typeof KlineSchema>;

export interface BinanceRestClientOptions {
  /** Binance.com or Binance.US base URL (default: https://api.binance.com) */
  baseUrl?: string;
  logger?: Logger;
}

/**
 * Binance REST API client
 *
 * Only the public klines endpoint is used, so no API key is needed.
 *
 * Reference: https://developers.binance.com/docs/binance-spot-api-docs/rest-api
 */
export class BinanceRestClient implements CandleFetcher {
  private readonly baseUrl: string;
  private readonly logger: Logger;

  constructor(options: BinanceRestClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? 'https://api.binance.com').replace(/\/+$/, '');
    this.logger = options.logger ?? createLogger('binance');
  }

  /**
   * Fetch closed candles starting at `startTs` (unix seconds, inclusive)
   *
   * Klines whose interval has not yet closed are left out. The result is
   * ascending with one candle per openTs.
   */
  async fetchCandles(symbol: string, timeframe: Timeframe, startTs: number, limit: number): Promise<Candle[]> {
    if (limit <= 0) return [];

    const params = new URLSearchParams({
      symbol,
      interval: timeframe,
      startTime: String(startTs * 1000),
      limit: String(Math.min(limit, MAX_KLINES_LIMIT)),
    });
    const path = `/api/v3/klines?${params.toString()}`;

    let klines: Kline[];
    try {
      klines = await this.request(path);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error({ event: 'klines_failed', err: message, symbol, timeframe, startTs }, 'Failed to fetch candles from Binance');
      throw err;
    }

    const now = Date.now();
    const candles: Candle[] = [];
    for (const kline of klines) {
      // Close time is the last millisecond of the interval
      if (kline[6] >= now) continue;
      candles.push(toCandle(symbol, timeframe, kline));
    }

    this.logger.debug({ event: 'klines_fetched', symbol, timeframe, startTs, count: candles.length }, `Fetched ${candles.length} candles`);
    return normalizeCandles(candles);
  }

  /**
   * All project timeframes are supported by Binance
   * (Binance uses the same format: 1m, 5m, 15m, 30m, 1h, 2h, 4h, 6h, 1d)
   */
  static readonly SUPPORTED_TIMEFRAMES: readonly Timeframe[] = [
    '1m', '5m', '15m', '30m', '1h', '2h', '4h', '6h', '1d',
  ];

  static isTimeframeSupported(timeframe: Timeframe): boolean {
    return BinanceRestClient.SUPPORTED_TIMEFRAMES.includes(timeframe);
  }

  private async request(path: string): Promise<Kline[]> {
    const url = `${this.baseUrl}${path}`;

    this.logger.debug({ method: 'GET', path: path.split('?')[0] }, 'Making Binance API request');

    const response = await fetch(url, { method: 'GET' });

    if (!response.ok) {
      const errorText = await response.text();
      this.logger.error(
        { status: response.status, statusText: response.statusText, error: errorText },
        'Binance API request failed'
      );
      throw new BinanceApiError(response.status, errorText, path.split('?')[0]);
    }

    const parsed = KlinesResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new BinanceApiError(response.status, `Malformed klines response: ${issues}`, path.split('?')[0]);
    }
    return parsed.data;
  }
}

/**
 * Map a kline row to a Candle with second-resolution timestamps
 */
export function toCandle(symbol: string, timeframe: Timeframe, kline: Kline): Candle {
  const openTs = Math.floor(kline[0] / 1000);
  return CandleSchema.parse({
    symbol,
    timeframe,
    openTs,
    closeTs: Math.max(openTs, Math.floor(kline[6] / 1000)),
    open: parseFloat(kline[1]),
    high: parseFloat(kline[2]),
    low: parseFloat(kline[3]),
    close: parseFloat(kline[4]),
    volume: parseFloat(kline[5]),
    isClosed: true,
  });
}
