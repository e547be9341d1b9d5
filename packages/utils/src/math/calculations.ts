/**
 * Numeric helpers shared by the indicator and zone code
 */

export function sum(values: number[]): number {
  let total = 0;
  for (const value of values) total += value;
  return total;
}

/** Arithmetic mean; 0 for an empty list */
export function mean(values: number[]): number {
  return values.length === 0 ? 0 : sum(values) / values.length;
}

/**
 * Distance between two prices as a fraction of `reference`
 *
 * @example relativeDistance(101, 100) // 0.01
 */
export function relativeDistance(price: number, reference: number): number {
  if (reference === 0) return Infinity;
  return Math.abs(price - reference) / reference;
}

/** True when [aLow, aHigh] and [bLow, bHigh] share at least one price */
export function rangesOverlap(aLow: number, aHigh: number, bLow: number, bHigh: number): boolean {
  return aLow <= bHigh && aHigh >= bLow;
}
