/**
 * Non-2xx or malformed response from the Binance REST API
 */
export class BinanceApiError extends Error {
  constructor(
    public readonly status: number,
    public readonly body: string,
    public readonly path: string
  ) {
    super(`Binance API error: ${status} on ${path}: ${body.slice(0, 200)}`);
    this.name = 'BinanceApiError';
  }
}
