/**
 * Thrown for misconfiguration of a sync instance (bad seed, unknown pair).
 * Sequencing problems with individual candles are never thrown.
 */
export class CandleSyncError extends Error {
  constructor(
    message: string,
    public readonly symbol: string,
    public readonly timeframe: string
  ) {
    super(message);
    this.name = 'CandleSyncError';
  }
}
