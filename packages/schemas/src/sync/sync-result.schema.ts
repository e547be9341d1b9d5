import { z } from 'zod';
import { TimeframeSchema } from '../market/candle.schema';

/**
 * Inclusive range of missing candle open times (unix seconds)
 */
export const GapRangeSchema = z
  .object({
    /** First missing open time */
    start: z.number().int().nonnegative(),
    /** Last missing open time */
    end: z.number().int().nonnegative(),
    /** Number of missing candles */
    missing: z.number().int().positive(),
  })
  .refine((gap) => gap.end >= gap.start, { message: 'gap end precedes start' });
export type GapRange = z.infer<typeof GapRangeSchema>;

/**
 * Forward-fill request handed to the historical fetch collaborator.
 * `startTs` is always the candle after the last accepted one.
 */
export const BackfillRequestSchema = z.object({
  symbol: z.string().min(1),
  timeframe: TimeframeSchema,
  startTs: z.number().int().nonnegative(),
  limit: z.number().int().positive(),
});
export type BackfillRequest = z.infer<typeof BackfillRequestSchema>;

/**
 * Outcome of feeding one closed candle to a sync instance.
 * Sequencing problems are results, not exceptions.
 */
export type SyncResult =
  | { status: 'accepted'; openTs: number; bootstrap: boolean }
  | { status: 'duplicate'; openTs: number }
  | { status: 'gap-detected'; openTs: number; gap: GapRange; backfill: BackfillRequest }
  | { status: 'rejected-stale'; openTs: number; lastOpenTs: number }
  | { status: 'rejected-invalid'; openTs: number | null; reason: string };

export type SyncStatus = SyncResult['status'];

/**
 * Read-only view of a sync instance's state
 */
export interface SyncStateSnapshot {
  symbol: string;
  timeframe: z.infer<typeof TimeframeSchema>;
  intervalSeconds: number;
  lastOpenTs: number | null;
}
