/**
 * Percentile with linear interpolation between closest ranks
 *
 * @param values - Sample (any order)
 * @param p - Percentile in [0, 100]
 * @returns Interpolated value, or NaN for an empty sample
 */
export function percentile(values: number[], p: number): number {
  if (values.length === 0) return NaN;

  const sorted = [...values].sort((a, b) => a - b);
  const bounded = Math.min(Math.max(p, 0), 100);
  const rank = (bounded / 100) * (sorted.length - 1);
  const lower = Math.floor(rank);
  const upper = Math.ceil(rank);

  if (lower === upper) return sorted[lower];
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (rank - lower);
}
