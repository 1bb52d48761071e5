/**
 * Deviation analysis pipeline:
 *   normalize -> filter -> aggregate -> { outliers, histogram, statistics } -> export shapes.
 *
 * Pure and request-scoped: no I/O, no module state, input rows are never mutated.
 * Only MissingColumnError (and invalid request input) escapes; everything else is
 * reported in `diagnostics`.
 */

import { z } from 'zod';
import { AppError } from '@/src/lib/errors/app-error';
import {
  analysisOptionsSchema,
  columnMapSchema,
  recordSelectionSchema,
  relativeWeightMapSchema,
} from './feedDeviation.schemas';
import type {
  AnalysisDiagnostic,
  BatchAggregate,
  ColumnMap,
  HistogramBinSet,
  IngredientRecord,
  ProcessedBatchRow,
  RawRow,
  RecordSelection,
  RelativeWeightMap,
  StatisticsSummary,
  StatisticsTableRow,
} from './feedDeviation.types';
import { normalizeRecords } from './recordNormalizer';
import { distinctValues, filterRecords } from './recordFilter';
import { aggregateBatches } from './weightedAggregator';
import { removeOutlierBatches, type OutlierSplit } from './outlierFilter';
import { buildHistogram } from './histogramBinner';
import { summarizeStatistics } from './statisticsSummarizer';
import {
  toProcessedRows,
  toStatisticsTable,
  toWeightTable,
} from './deviationExport';
import {
  createDeviationRunLogger,
  type DeviationRunLogger,
} from './deviationLogger';

const requestOptionsSchema = analysisOptionsSchema
  .partial()
  .required({ toleranceThreshold: true });

export type DeviationAnalysisOptions = z.infer<typeof requestOptionsSchema>;

export type DeviationAnalysisRequest = {
  columns: ColumnMap;
  /** Sheet header row, when known (detects missing columns on an empty sheet). */
  headers?: string[];
  selection?: RecordSelection;
  weights?: RelativeWeightMap;
  options: DeviationAnalysisOptions;
  logger?: DeviationRunLogger;
};

export type DeviationAnalysisResult = {
  runId: string;
  counts: {
    inputRows: number;
    normalizedRecords: number;
    filteredRecords: number;
    batches: number;
    outliers: number;
  };
  /** Records that passed the filter stage. */
  records: IngredientRecord[];
  /** Food types seen in the filtered records, sorted. */
  foodTypes: string[];
  aggregates: BatchAggregate[];
  outliers: OutlierSplit;
  histogram: HistogramBinSet;
  statistics: StatisticsSummary;
  statisticsTable: StatisticsTableRow[];
  processedRows: ProcessedBatchRow[];
  weightTable: Array<{ foodType: string; weight: number; isDefault: boolean }>;
  diagnostics: AnalysisDiagnostic[];
};

function parseOrThrow<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
  what: string,
): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new AppError(
      'VALIDATION_ERROR',
      `Invalid ${what}: ${result.error.issues
        .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('; ')}`,
    );
  }
  return result.data;
}

function timed<T>(fn: () => T): { value: T; durationMs: number } {
  const start = Date.now();
  const value = fn();
  return { value, durationMs: Date.now() - start };
}

export function runDeviationAnalysis(
  rows: readonly RawRow[],
  request: DeviationAnalysisRequest,
): DeviationAnalysisResult {
  const columns = parseOrThrow(columnMapSchema, request.columns, 'column map');
  const selection = parseOrThrow(
    recordSelectionSchema,
    request.selection ?? {},
    'selection',
  );
  const weights = parseOrThrow(
    relativeWeightMapSchema,
    request.weights ?? {},
    'weights',
  );
  const options = parseOrThrow(requestOptionsSchema, request.options, 'options');
  const logger = request.logger ?? createDeviationRunLogger();
  const diagnostics: AnalysisDiagnostic[] = [];
  const report = (list: AnalysisDiagnostic[]) => {
    for (const d of list) {
      diagnostics.push(d);
      logger.diagnostic(d);
    }
  };

  logger.event('run_start', {
    inputRows: rows.length,
    options,
    selection,
  });

  const normalized = timed(() =>
    normalizeRecords(rows, columns, { headers: request.headers }),
  );
  report(normalized.value.diagnostics);
  const records = normalized.value.records;
  logger.stage(
    'normalize',
    { before: rows.length, after: records.length },
    normalized.durationMs,
  );

  const filtered = timed(() => filterRecords(records, selection));
  logger.stage(
    'filter',
    { before: records.length, after: filtered.value.length },
    filtered.durationMs,
  );
  if (filtered.value.length === 0) {
    report([
      {
        code: 'EMPTY_RESULT',
        severity: 'info',
        message: 'No records match the selected filters',
      },
    ]);
  }

  const aggregated = timed(() =>
    aggregateBatches(filtered.value, weights, {
      defaultWeight: options.defaultWeight,
      applyWeightToQuantity: options.applyWeightToQuantity,
      onBatch: (a) =>
        logger.batch(a.batchCode, {
          weightedAvgPct: a.weightedAvgPct,
          totalAdjustedQty: a.totalAdjustedQty,
          ingredientCount: a.ingredientCount,
        }),
    }),
  );
  report(aggregated.value.diagnostics);
  const aggregates = aggregated.value.aggregates;
  logger.stage(
    'aggregate',
    {
      before: new Set(filtered.value.map((r) => r.batchCode)).size,
      after: aggregates.length,
    },
    aggregated.durationMs,
  );
  if (filtered.value.length > 0 && aggregates.length === 0) {
    report([
      {
        code: 'EMPTY_RESULT',
        severity: 'info',
        message: 'No batch produced a weighted average',
      },
    ]);
  }

  const outlierMode = options.outlierMode ?? 'upper';
  const outliers = removeOutlierBatches(aggregates, outlierMode);
  logger.stage('outliers', {
    before: aggregates.length,
    after: outliers.kept.length,
  });

  const histogramInput = options.removeOutliersFromHistogram
    ? outliers.kept
    : aggregates;
  const histogram = buildHistogram(
    histogramInput.map((a) => a.weightedAvgPct),
    {
      toleranceThreshold: options.toleranceThreshold,
      maxBins: options.maxBins,
      degenerateMargin: options.degenerateMargin,
    },
  );

  const statistics = summarizeStatistics(aggregates, {
    toleranceThreshold: options.toleranceThreshold,
    bucketWidth: options.bucketWidth,
    bucketCount: options.bucketCount,
    outlierMode,
  });

  const foodTypes = distinctValues(filtered.value, 'foodType');

  logger.event('run_done', {
    batches: aggregates.length,
    outliers: outliers.removed.length,
    bins: histogram.bins.length,
    diagnostics: diagnostics.length,
  });

  return {
    runId: logger.runId,
    counts: {
      inputRows: rows.length,
      normalizedRecords: records.length,
      filteredRecords: filtered.value.length,
      batches: aggregates.length,
      outliers: outliers.removed.length,
    },
    records: filtered.value,
    foodTypes,
    aggregates,
    outliers,
    histogram,
    statistics,
    statisticsTable: toStatisticsTable(statistics),
    processedRows: toProcessedRows(
      aggregates,
      options.toleranceThreshold,
      options.bucketWidth,
    ),
    weightTable: toWeightTable(foodTypes, weights, options.defaultWeight),
    diagnostics,
  };
}
