import { z } from 'zod';
import { TimeframeSchema } from './candle.schema';

export const TrendDirectionSchema = z.enum(['bullish', 'bearish', 'neutral']);
export type TrendDirection = z.infer<typeof TrendDirectionSchema>;

export const TrendStrengthSchema = z.enum(['weak', 'moderate', 'strong']);
export type TrendStrength = z.infer<typeof TrendStrengthSchema>;

/**
 * Trend state supplied by an external trend detector.
 * Consumed by parameter adaptation; never produced by the liquidity engine.
 */
export const TrendStateSchema = z.object({
  direction: TrendDirectionSchema,
  strength: TrendStrengthSchema,
  /** Timeframe the trend was measured on, when known */
  timeframe: TimeframeSchema.optional(),
});
export type TrendState = z.infer<typeof TrendStateSchema>;
