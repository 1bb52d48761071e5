/**
 * IQR outlier filter (Tukey fences).
 *
 * Quantiles use linear interpolation between closest ranks: position (n - 1) * p on the
 * sorted sample (the common "type 7" definition). Every caller goes through
 * `quantile`, so one run never mixes interpolation schemes.
 */

import type {
  BatchAggregate,
  OutlierBounds,
  OutlierMode,
} from './feedDeviation.types';

export const IQR_MULTIPLIER = 1.5;

export function sortAscending(values: readonly number[]): number[] {
  return [...values].sort((a, b) => a - b);
}

/** Linear-interpolation quantile of an ascending sample. */
export function quantile(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) {
    throw new RangeError('quantile of an empty sample');
  }
  const clamped = Math.min(1, Math.max(0, p));
  const pos = (sorted.length - 1) * clamped;
  const base = Math.floor(pos);
  const rest = pos - base;
  const left = sorted[base];
  const right = sorted[Math.min(sorted.length - 1, base + 1)];
  return left + rest * (right - left);
}

/** Bounds from whatever points exist; null for an empty sample. */
export function computeOutlierBounds(
  values: readonly number[],
): OutlierBounds | null {
  if (values.length === 0) return null;
  const sorted = sortAscending(values);
  const q1 = quantile(sorted, 0.25);
  const q3 = quantile(sorted, 0.75);
  const iqr = q3 - q1;
  return {
    q1,
    q3,
    iqr,
    lowerBound: q1 - IQR_MULTIPLIER * iqr,
    upperBound: q3 + IQR_MULTIPLIER * iqr,
  };
}

export function isOutlier(
  value: number,
  bounds: OutlierBounds,
  mode: OutlierMode = 'upper',
): boolean {
  // Collapsed fence: nothing is flagged.
  if (bounds.iqr === 0) return false;
  if (value > bounds.upperBound) return true;
  return mode === 'both' && value < bounds.lowerBound;
}

export function excludeOutliers(
  values: readonly number[],
  bounds: OutlierBounds | null,
  mode: OutlierMode = 'upper',
): number[] {
  if (!bounds) return [...values];
  return values.filter((v) => !isOutlier(v, bounds, mode));
}

export type OutlierSplit = {
  kept: BatchAggregate[];
  removed: BatchAggregate[];
  bounds: OutlierBounds | null;
};

/** Apply the fences to weightedAvgPct of a batch sequence. Order is preserved. */
export function removeOutlierBatches(
  aggregates: readonly BatchAggregate[],
  mode: OutlierMode = 'upper',
): OutlierSplit {
  const bounds = computeOutlierBounds(
    aggregates.map((a) => a.weightedAvgPct),
  );
  const kept: BatchAggregate[] = [];
  const removed: BatchAggregate[] = [];
  for (const a of aggregates) {
    if (bounds && isOutlier(a.weightedAvgPct, bounds, mode)) {
      removed.push(a);
    } else {
      kept.push(a);
    }
  }
  return { kept, removed, bounds };
}
