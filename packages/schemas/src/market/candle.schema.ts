import { z } from 'zod';

/**
 * Timeframe enum - canonical candle intervals
 *
 * Binance kline intervals use the same notation, so no mapping is needed
 * between the engine and the REST collaborator.
 */
export const TimeframeSchema = z.enum([
  '1m',   // 1 minute
  '5m',   // 5 minutes
  '15m',  // 15 minutes
  '30m',  // 30 minutes
  '1h',   // 1 hour
  '2h',   // 2 hours
  '4h',   // 4 hours
  '6h',   // 6 hours
  '1d',   // 1 day
]);
export type Timeframe = z.infer<typeof TimeframeSchema>;

/**
 * Candle (OHLCV) data schema
 *
 * Timestamps are unix seconds. `openTs` identifies the candle within its
 * (symbol, timeframe) series.
 */
export const CandleSchema = z
  .object({
    /** Trading pair symbol (e.g., 'BTCUSDT') */
    symbol: z.string().min(1),
    /** Candle timeframe */
    timeframe: TimeframeSchema,
    /** Interval open time (unix seconds) */
    openTs: z.number().int().nonnegative(),
    /** Interval close time (unix seconds) */
    closeTs: z.number().int().nonnegative(),
    open: z.number().positive(),
    high: z.number().positive(),
    low: z.number().positive(),
    close: z.number().positive(),
    /** Base asset volume */
    volume: z.number().nonnegative(),
    /** False while the exchange is still building the interval */
    isClosed: z.boolean().default(true),
  })
  .superRefine((candle, ctx) => {
    if (candle.high < Math.max(candle.open, candle.close, candle.low)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['high'],
        message: 'high must be >= open, close and low',
      });
    }
    if (candle.low > Math.min(candle.open, candle.close)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['low'],
        message: 'low must be <= open and close',
      });
    }
    if (candle.closeTs < candle.openTs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['closeTs'],
        message: 'closeTs must not precede openTs',
      });
    }
  });

// Export inferred TypeScript types
export type Candle = z.infer<typeof CandleSchema>;
export type CandleInput = z.input<typeof CandleSchema>;
