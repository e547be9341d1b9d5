/**
 * Collaborator contracts consumed by the sync engine:
 * - CandleFetcher: forward historical fetch (REST)
 * - CandleStore / CandleSink: persisted candle lookup and writes
 */
export * from './rest-client.schema';
export * from './candle-store.schema';
