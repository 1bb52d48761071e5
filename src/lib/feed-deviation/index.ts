/**
 * Feed deviation analysis - Public API
 */

export type {
  RequiredColumn,
  ColumnMap,
  RawRow,
  IngredientRecord,
  RelativeWeightMap,
  BatchAggregate,
  OutlierBounds,
  OutlierMode,
  HistogramBin,
  HistogramBinSet,
  HistogramColorClass,
  RangeBucket,
  StatisticsSummary,
  AnalysisDiagnostic,
  AnalysisDiagnosticCode,
  RecordSelection,
  DeviationSeverity,
  ProcessedBatchRow,
  StatisticsTableRow,
} from './feedDeviation.types';

export {
  ALL_SENTINEL,
  feedDeviationConfigSchema,
  relativeWeightMapSchema,
  recordSelectionSchema,
} from './feedDeviation.schemas';
export type {
  SheetLayout,
  AnalysisOptions,
  FeedDeviationConfig,
} from './feedDeviation.schemas';

export {
  getFeedDeviationConfig,
  resetFeedDeviationConfigCache,
  DEFAULT_FEED_DEVIATION_CONFIG,
} from './feedDeviation.config';

export { normalizeRecords, coerceNumber, coerceDate } from './recordNormalizer';
export { filterRecords, distinctValues, dateRange } from './recordFilter';
export {
  aggregateBatches,
  computeBatchAggregate,
  resolveWeight,
  DEFAULT_WEIGHT,
} from './weightedAggregator';
export {
  quantile,
  computeOutlierBounds,
  excludeOutliers,
  removeOutlierBatches,
} from './outlierFilter';
export { buildHistogram, freedmanDiaconisWidth } from './histogramBinner';
export { summarizeStatistics } from './statisticsSummarizer';
export {
  toStatisticsTable,
  toProcessedRows,
  toWeightTable,
  classifyDeviation,
} from './deviationExport';
export { runDeviationAnalysis } from './deviationAnalysis.service';
export type {
  DeviationAnalysisRequest,
  DeviationAnalysisResult,
  DeviationAnalysisOptions,
} from './deviationAnalysis.service';
export { createDeviationRunLogger } from './deviationLogger';
export type { DeviationRunLogger } from './deviationLogger';
export { readWorkbookRows, rowsFromMatrix } from './ingest/workbookReader';
