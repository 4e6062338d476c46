import type { PercentileImpact } from "../interfaces/analysis.interface";

export const IMPACT_PERCENTILES = [75, 80, 85, 90, 95, 99] as const;

/**
 * Quantile with linear interpolation between closest ranks
 * q in [0, 1]; returns NaN for an empty list
 */
export function quantile(values: readonly number[], q: number): number {
  if (values.length === 0) {
    return Number.NaN;
  }
  const sorted = [...values].sort((a, b) => a - b);
  const position = (sorted.length - 1) * Math.min(1, Math.max(0, q));
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  const fraction = position - lower;
  return sorted[lower] + (sorted[upper] - sorted[lower]) * fraction;
}

/**
 * For each percentile, how many values lie strictly above the value at that percentile.
 * Informational only; never used to flag anything.
 */
export function percentileImpact(
  values: readonly number[],
  percentiles: readonly number[] = IMPACT_PERCENTILES
): PercentileImpact[] {
  if (values.length === 0) {
    return [];
  }
  return percentiles.map((percentile) => {
    const threshold = quantile(values, percentile / 100);
    return {
      percentile,
      threshold,
      flaggedCount: values.filter((value) => value > threshold).length,
      totalCount: values.length,
    };
  });
}
