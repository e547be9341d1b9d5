import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { BinanceRestClient } from '../rest/client';
import { BinanceApiError } from '../errors';

const BASE_TS = 1704067200;

function kline(index: number, close = '100.5'): unknown[] {
  const openMs = (BASE_TS + index * 60) * 1000;
  return [openMs, '100.0', '101.0', '99.0', close, '12.5', openMs + 59_999, '1250.0', 42, '6.0', '600.0', '0'];
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('BinanceRestClient', () => {
  const fetchMock = vi.fn<(input: string, init?: RequestInit) => Promise<Response>>();

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime((BASE_TS + 3600) * 1000);
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.unstubAllGlobals();
  });

  it('requests klines from startTs in milliseconds', async () => {
    fetchMock.mockResolvedValue(jsonResponse([]));
    const client = new BinanceRestClient();

    await client.fetchCandles('BTCUSDT', '1m', BASE_TS, 2);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0][0]).toBe(
      'https://api.binance.com/api/v3/klines?symbol=BTCUSDT&interval=1m&startTime=1704067200000&limit=2'
    );
  });

  it('caps the limit at 1000 and trims a trailing slash from the base url', async () => {
    fetchMock.mockResolvedValue(jsonResponse([]));
    const client = new BinanceRestClient({ baseUrl: 'https://api.binance.us/' });

    await client.fetchCandles('ETHUSDT', '5m', BASE_TS, 5000);

    expect(fetchMock.mock.calls[0][0]).toBe(
      'https://api.binance.us/api/v3/klines?symbol=ETHUSDT&interval=5m&startTime=1704067200000&limit=1000'
    );
  });

  it('maps klines to ascending candles in seconds without duplicates', async () => {
    fetchMock.mockResolvedValue(jsonResponse([kline(1, '100.7'), kline(0), kline(1, '100.9')]));
    const client = new BinanceRestClient();

    const candles = await client.fetchCandles('BTCUSDT', '1m', BASE_TS, 3);

    expect(candles).toEqual([
      {
        symbol: 'BTCUSDT',
        timeframe: '1m',
        openTs: BASE_TS,
        closeTs: BASE_TS + 59,
        open: 100,
        high: 101,
        low: 99,
        close: 100.5,
        volume: 12.5,
        isClosed: true,
      },
      {
        symbol: 'BTCUSDT',
        timeframe: '1m',
        openTs: BASE_TS + 60,
        closeTs: BASE_TS + 119,
        open: 100,
        high: 101,
        low: 99,
        close: 100.9,
        volume: 12.5,
        isClosed: true,
      },
    ]);
  });

  it('leaves out a kline whose interval has not closed', async () => {
    vi.setSystemTime((BASE_TS + 150) * 1000);
    fetchMock.mockResolvedValue(jsonResponse([kline(0), kline(1), kline(2)]));
    const client = new BinanceRestClient();

    const candles = await client.fetchCandles('BTCUSDT', '1m', BASE_TS, 3);

    expect(candles.map((c) => c.openTs)).toEqual([BASE_TS, BASE_TS + 60]);
  });

  it('throws BinanceApiError with the status on a non-2xx response', async () => {
    fetchMock.mockResolvedValue(new Response('rate limited', { status: 429 }));
    const client = new BinanceRestClient();

    const error = await client.fetchCandles('BTCUSDT', '1m', BASE_TS, 10).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(BinanceApiError);
    expect(error).toMatchObject({ status: 429, body: 'rate limited', path: '/api/v3/klines' });
  });

  it('throws BinanceApiError on a malformed body', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ code: -1121, msg: 'Invalid symbol.' }));
    const client = new BinanceRestClient();

    await expect(client.fetchCandles('NOPE', '1m', BASE_TS, 10)).rejects.toBeInstanceOf(BinanceApiError);
  });

  it('does not call the API for a non-positive limit', async () => {
    const client = new BinanceRestClient();

    expect(await client.fetchCandles('BTCUSDT', '1m', BASE_TS, 0)).toEqual([]);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('supports every project timeframe', () => {
    expect(BinanceRestClient.isTimeframeSupported('4h')).toBe(true);
  });
});
