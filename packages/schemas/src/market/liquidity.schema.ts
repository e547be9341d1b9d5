import { z } from 'zod';
import { TimeframeSchema } from './candle.schema';

/**
 * Zone kinds produced by the zone detector and the pattern plugins
 */
export const ZoneKindSchema = z.enum([
  'support',
  'resistance',
  'order-block',
  'fvg',
  'breaker-block',
  'liquidity-level',
  'liquidity-sweep',
  'structure-break',
]);
export type ZoneKind = z.infer<typeof ZoneKindSchema>;

export const ZoneStrengthSchema = z.enum(['weak', 'moderate', 'strong']);
export type ZoneStrength = z.infer<typeof ZoneStrengthSchema>;

/**
 * Directional bias of a zone.
 * Support, bullish order blocks and sell-side levels are bullish reaction areas.
 */
export const ZoneBiasSchema = z.enum(['bullish', 'bearish', 'neutral']);
export type ZoneBias = z.infer<typeof ZoneBiasSchema>;

/**
 * Position of a zone inside the recent swing range
 */
export const PdPositionSchema = z.enum(['premium', 'equilibrium', 'discount']);
export type PdPosition = z.infer<typeof PdPositionSchema>;

/**
 * Strength ranking used by merge, confluence and query filters
 */
export const STRENGTH_RANK: Record<ZoneStrength, number> = {
  weak: 1,
  moderate: 2,
  strong: 3,
};

/**
 * Liquidity zone schema
 */
export const LiquidityZoneSchema = z
  .object({
    id: z.string().min(1),
    symbol: z.string().min(1),
    timeframe: TimeframeSchema,
    kind: ZoneKindSchema,
    bias: ZoneBiasSchema,
    priceLow: z.number().positive(),
    priceHigh: z.number().positive(),
    /** Open time of the originating candle (unix seconds) */
    createdTs: z.number().int().nonnegative(),
    strength: ZoneStrengthSchema,
    touchCount: z.number().int().nonnegative(),
    volume: z.number().nonnegative(),
    isMitigated: z.boolean(),
    /** Weighted multi-timeframe score, overwritten by confluence computation */
    confluenceWeight: z.number().nonnegative(),
    lastTouchTs: z.number().int().nonnegative().nullable(),
    pdPosition: PdPositionSchema,
  })
  .refine((zone) => zone.priceLow <= zone.priceHigh, {
    message: 'priceLow must be <= priceHigh',
    path: ['priceLow'],
  });
export type LiquidityZone = z.infer<typeof LiquidityZoneSchema>;

/**
 * Query filters for zone lookups
 */
export const ZoneFilterSchema = z.object({
  kinds: z.array(ZoneKindSchema).optional(),
  bias: ZoneBiasSchema.optional(),
  /** Include zones already mitigated/broken (default: false) */
  includeMitigated: z.boolean().optional(),
  minStrength: ZoneStrengthSchema.optional(),
  /** Sort by distance to this price instead of recency */
  nearPrice: z.number().positive().optional(),
});
export type ZoneFilter = z.infer<typeof ZoneFilterSchema>;
