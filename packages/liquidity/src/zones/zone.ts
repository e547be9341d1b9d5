import {
  LiquidityZoneSchema,
  type LiquidityZone,
  type ZoneBias,
  type ZoneKind,
  type ZoneStrength,
  type Timeframe,
} from '@strata/schemas';
import { ZoneValidationError } from '../errors';

/**
 * Fields a producer supplies; the rest start at their initial state
 */
export interface ZoneCandidate {
  id: string;
  symbol: string;
  timeframe: Timeframe;
  kind: ZoneKind;
  bias: ZoneBias;
  priceLow: number;
  priceHigh: number;
  createdTs: number;
  strength?: ZoneStrength;
  touchCount?: number;
  volume?: number;
}

export function createZone(candidate: ZoneCandidate): LiquidityZone {
  const parsed = LiquidityZoneSchema.safeParse({
    ...candidate,
    strength: candidate.strength ?? 'weak',
    touchCount: candidate.touchCount ?? 0,
    volume: candidate.volume ?? 0,
    isMitigated: false,
    confluenceWeight: 0,
    lastTouchTs: null,
    pdPosition: 'equilibrium',
  });
  if (!parsed.success) {
    throw new ZoneValidationError(candidate.id, parsed.error.issues);
  }
  return parsed.data;
}

export function zoneMidpoint(zone: Pick<LiquidityZone, 'priceLow' | 'priceHigh'>): number {
  return (zone.priceLow + zone.priceHigh) / 2;
}
