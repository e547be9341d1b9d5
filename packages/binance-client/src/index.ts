/**
 * @strata/binance-client
 *
 * Binance REST klines client
 */

export { BinanceRestClient, MAX_KLINES_LIMIT, toCandle, type BinanceRestClientOptions, type Kline } from './rest/client';
export { BinanceApiError } from './errors';
