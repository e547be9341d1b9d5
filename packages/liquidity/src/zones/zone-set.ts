import { STRENGTH_RANK, type Candle, type LiquidityZone, type PdPosition, type Timeframe } from '@strata/schemas';
import { rangesOverlap, timeframeToSeconds } from '@strata/utils';
import { zoneMidpoint } from './zone';

export interface AgeFilterResult {
  kept: LiquidityZone[];
  removed: LiquidityZone[];
}

export interface MergeResult {
  zones: LiquidityZone[];
  added: number;
  merged: number;
}

/**
 * Split zones into those within and beyond the age limit (in candles)
 */
export function ageFilter(
  zones: LiquidityZone[],
  nowTs: number,
  timeframe: Timeframe,
  maxAgeCandles: number
): AgeFilterResult {
  const interval = timeframeToSeconds(timeframe);
  const kept: LiquidityZone[] = [];
  const removed: LiquidityZone[] = [];
  for (const zone of zones) {
    if ((nowTs - zone.createdTs) / interval > maxAgeCandles) removed.push({ ...zone });
    else kept.push({ ...zone });
  }
  return { kept, removed };
}

function outranks(a: LiquidityZone, b: LiquidityZone): boolean {
  const rankDiff = STRENGTH_RANK[a.strength] - STRENGTH_RANK[b.strength];
  if (rankDiff !== 0) return rankDiff > 0;
  return a.touchCount > b.touchCount;
}

/**
 * Fold candidates into an existing zone set
 *
 * A candidate overlapping a same-bias zone (after widening by radiusPct of
 * its midpoint) merges into it: the stronger one survives, existing zones
 * winning ties, and the survivor's touchCount becomes max + 1. Candidates
 * whose id is already present are skipped.
 */
export function mergeZones(
  existing: LiquidityZone[],
  candidates: LiquidityZone[],
  radiusPct: number
): MergeResult {
  const zones = existing.map((zone) => ({ ...zone }));
  const ids = new Set(zones.map((zone) => zone.id));
  let added = 0;
  let merged = 0;

  for (const candidate of candidates) {
    if (ids.has(candidate.id)) continue;

    const pad = radiusPct * zoneMidpoint(candidate);
    const low = candidate.priceLow - pad;
    const high = candidate.priceHigh + pad;
    const index = zones.findIndex(
      (zone) => zone.bias === candidate.bias && rangesOverlap(zone.priceLow, zone.priceHigh, low, high)
    );

    if (index === -1) {
      zones.push({ ...candidate });
      ids.add(candidate.id);
      added++;
      continue;
    }

    const current = zones[index];
    const winner = outranks(candidate, current) ? candidate : current;
    zones[index] = { ...winner, touchCount: Math.max(current.touchCount, candidate.touchCount) + 1 };
    if (winner === candidate) {
      ids.delete(current.id);
      ids.add(candidate.id);
    }
    merged++;
  }

  return { zones, added, merged };
}

const isLevelZone = (zone: LiquidityZone) => zone.kind === 'support' || zone.kind === 'resistance';

/**
 * Count wick touches and close-through breaks on active zones
 *
 * Only candles opening after the zone formed and after its last recorded
 * touch are considered, so each candle counts at most once per zone.
 * Close-through mitigation applies to support and resistance zones; plugin
 * zones are mitigated by their plugin.
 */
export function refreshTouches(zones: LiquidityZone[], candles: Candle[]): LiquidityZone[] {
  return zones.map((original) => {
    const zone = { ...original };
    if (zone.isMitigated) return zone;

    for (const candle of candles) {
      if (candle.openTs <= zone.createdTs) continue;
      if (zone.lastTouchTs !== null && candle.openTs <= zone.lastTouchTs) continue;

      if (rangesOverlap(candle.low, candle.high, zone.priceLow, zone.priceHigh)) {
        zone.touchCount++;
        zone.lastTouchTs = candle.openTs;
      }

      const broken =
        (zone.kind === 'support' && candle.close < zone.priceLow) ||
        (zone.kind === 'resistance' && candle.close > zone.priceHigh);
      if (broken) {
        zone.isMitigated = true;
        break;
      }
    }
    return zone;
  });
}

/**
 * Re-rank active support/resistance zones by touches and volume
 *
 * The volume threshold is the 70th-percentile volume of those zones.
 */
export function recalculateStrength(zones: LiquidityZone[]): LiquidityZone[] {
  const volumes = zones
    .filter((zone) => isLevelZone(zone) && !zone.isMitigated)
    .map((zone) => zone.volume)
    .sort((a, b) => a - b);
  if (volumes.length === 0) return zones.map((zone) => ({ ...zone }));

  const threshold = volumes[Math.floor(volumes.length * 0.7)];

  return zones.map((zone): LiquidityZone => {
    if (!isLevelZone(zone) || zone.isMitigated) return { ...zone };
    if (zone.touchCount >= 3 && zone.volume >= threshold) return { ...zone, strength: 'strong' };
    if (zone.touchCount >= 2 || zone.volume >= threshold * 0.5) return { ...zone, strength: 'moderate' };
    return { ...zone, strength: 'weak' };
  });
}

/**
 * Place each zone in the premium/discount range of the given candles
 *
 * Zones within `band` of the range midpoint are equilibrium.
 */
export function assignPdPosition(
  zones: LiquidityZone[],
  candles: Pick<Candle, 'high' | 'low'>[],
  band = 0.05
): LiquidityZone[] {
  if (candles.length === 0) return zones.map((zone) => ({ ...zone }));

  const rangeHigh = Math.max(...candles.map((c) => c.high));
  const rangeLow = Math.min(...candles.map((c) => c.low));
  const range = rangeHigh - rangeLow;

  return zones.map((zone) => {
    let pdPosition: PdPosition = 'equilibrium';
    if (range > 0) {
      const position = (zoneMidpoint(zone) - rangeLow) / range;
      if (position > 0.5 + band) pdPosition = 'premium';
      else if (position < 0.5 - band) pdPosition = 'discount';
    }
    return { ...zone, pdPosition };
  });
}
