/**
 * Histogram binner: Freedman–Diaconis bin width over the observed range, plus a colour
 * class per bar relative to the tolerance threshold.
 */

import { computeOutlierBounds } from './outlierFilter';
import type {
  HistogramBin,
  HistogramBinSet,
  HistogramColorClass,
} from './feedDeviation.types';

export const DEFAULT_MAX_BINS = 100;
export const DEFAULT_DEGENERATE_MARGIN = 0.5;

export type HistogramOptions = {
  toleranceThreshold: number;
  maxBins?: number;
  /** Half-width of the single bin used when the FD width is 0. */
  degenerateMargin?: number;
};

/** 2 * IQR * n^(-1/3); 0 for an empty sample. */
export function freedmanDiaconisWidth(values: readonly number[]): number {
  const bounds = computeOutlierBounds(values);
  if (!bounds) return 0;
  return 2 * bounds.iqr * Math.pow(values.length, -1 / 3);
}

export function colorForBin(
  lowerEdge: number,
  upperEdge: number,
  toleranceThreshold: number,
  lastEdge: number,
): { colorClass: HistogramColorClass; intensity: number } {
  const mid = (lowerEdge + upperEdge) / 2;
  if (mid >= toleranceThreshold) {
    const span = lastEdge - toleranceThreshold;
    const intensity = span > 0 ? (mid - toleranceThreshold) / span : 1;
    return { colorClass: 'above-tolerance', intensity: clamp01(intensity) };
  }
  const intensity =
    toleranceThreshold > 0
      ? (toleranceThreshold - mid) / toleranceThreshold
      : 1;
  return { colorClass: 'within-tolerance', intensity: clamp01(intensity) };
}

function clamp01(v: number): number {
  return Math.min(1, Math.max(0, v));
}

export function buildHistogram(
  values: readonly number[],
  options: HistogramOptions,
): HistogramBinSet {
  const { toleranceThreshold } = options;
  const maxBins = Math.max(1, options.maxBins ?? DEFAULT_MAX_BINS);
  const margin = options.degenerateMargin ?? DEFAULT_DEGENERATE_MARGIN;

  if (values.length === 0) {
    return {
      bins: [],
      binWidth: 0,
      min: null,
      max: null,
      total: 0,
      toleranceThreshold,
    };
  }

  let min = values[0];
  let max = values[0];
  for (const v of values) {
    if (v < min) min = v;
    if (v > max) max = v;
  }

  const fdWidth = freedmanDiaconisWidth(values);
  const edges: number[] = [];
  if (fdWidth <= 0 || max === min) {
    edges.push(min - margin, max + margin);
  } else {
    const binCount = Math.min(
      maxBins,
      Math.max(1, Math.ceil((max - min) / fdWidth)),
    );
    const step = (max - min) / binCount;
    for (let i = 0; i < binCount; i++) edges.push(min + i * step);
    edges.push(max);
  }

  const binCount = edges.length - 1;
  const first = edges[0];
  const last = edges[binCount];
  const binWidth = (last - first) / binCount;
  const counts = new Array<number>(binCount).fill(0);
  for (const v of values) {
    // Last bin is closed on the right.
    let idx = Math.min(
      binCount - 1,
      Math.max(0, Math.floor((v - first) / binWidth)),
    );
    // The division can land one bin off an edge; the stored edges decide.
    while (idx > 0 && v < edges[idx]) idx--;
    while (idx < binCount - 1 && v >= edges[idx + 1]) idx++;
    counts[idx] += 1;
  }

  const bins: HistogramBin[] = [];
  for (let i = 0; i < binCount; i++) {
    const lowerEdge = edges[i];
    const upperEdge = edges[i + 1];
    bins.push({
      lowerEdge,
      upperEdge,
      count: counts[i],
      ...colorForBin(lowerEdge, upperEdge, toleranceThreshold, last),
    });
  }

  return {
    bins,
    binWidth,
    min,
    max,
    total: values.length,
    toleranceThreshold,
  };
}
