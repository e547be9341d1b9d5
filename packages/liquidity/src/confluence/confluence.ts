import {
  STRENGTH_RANK,
  type LiquidityZone,
  type Timeframe,
  type TimeframeConfig,
  type ZoneStrength,
} from '@strata/schemas';
import { zoneMidpoint } from '../zones/zone';

export interface ConfluenceGroup {
  /** Representative zone (a copy) carrying the group weight */
  zone: LiquidityZone;
  weight: number;
  timeframes: Timeframe[];
  members: LiquidityZone[];
}

type ConfigLookup = (timeframe: Timeframe) => TimeframeConfig;

function compareRepresentative(a: LiquidityZone, b: LiquidityZone, configFor: ConfigLookup): number {
  return (
    configFor(a.timeframe).tfWeight - configFor(b.timeframe).tfWeight ||
    STRENGTH_RANK[a.strength] - STRENGTH_RANK[b.strength] ||
    a.touchCount - b.touchCount ||
    a.volume - b.volume
  );
}

function groupByProximity(sorted: LiquidityZone[], configFor: ConfigLookup): LiquidityZone[][] {
  const groups: LiquidityZone[][] = [];
  let current: LiquidityZone[] = [];
  let radius = 0;
  let radiusWeight = 0;

  for (const zone of sorted) {
    const config = configFor(zone.timeframe);
    if (current.length === 0) {
      current = [zone];
      radius = config.mergeRadiusPct;
      radiusWeight = config.tfWeight;
      continue;
    }

    // The heaviest timeframe in the group, counting the joining zone, sets the radius
    const joinRadius = config.tfWeight > radiusWeight ? config.mergeRadiusPct : radius;
    const previous = zoneMidpoint(current[current.length - 1]);

    if (Math.abs(zoneMidpoint(zone) - previous) <= joinRadius * previous) {
      current.push(zone);
      if (config.tfWeight > radiusWeight) {
        radius = config.mergeRadiusPct;
        radiusWeight = config.tfWeight;
      }
    } else {
      groups.push(current);
      current = [zone];
      radius = config.mergeRadiusPct;
      radiusWeight = config.tfWeight;
    }
  }
  if (current.length > 0) groups.push(current);
  return groups;
}

/**
 * Group nearby zones across timeframes and score them
 *
 * Weight is the sum of tfWeight over the distinct timeframes in a group.
 * Groups spanning fewer than `minDistinctTimeframes` timeframes, or whose
 * representative is weaker than `minStrength`, are dropped. Results are
 * ordered by weight, then distinct timeframe count.
 */
export function findConfluence(
  zones: LiquidityZone[],
  configFor: ConfigLookup,
  minDistinctTimeframes = 2,
  minStrength?: ZoneStrength
): ConfluenceGroup[] {
  const active = zones
    .filter((zone) => !zone.isMitigated)
    .sort((a, b) => zoneMidpoint(a) - zoneMidpoint(b));

  const results: ConfluenceGroup[] = [];
  for (const members of groupByProximity(active, configFor)) {
    const timeframes = [...new Set(members.map((zone) => zone.timeframe))];
    if (timeframes.length < minDistinctTimeframes) continue;

    const weight = timeframes.reduce((total, tf) => total + configFor(tf).tfWeight, 0);
    const representative = members.reduce((best, zone) =>
      compareRepresentative(zone, best, configFor) > 0 ? zone : best
    );
    if (minStrength && STRENGTH_RANK[representative.strength] < STRENGTH_RANK[minStrength]) continue;

    results.push({
      zone: { ...representative, confluenceWeight: weight },
      weight,
      timeframes,
      members: members.map((zone) => ({ ...zone })),
    });
  }

  return results.sort((a, b) => b.weight - a.weight || b.timeframes.length - a.timeframes.length);
}
