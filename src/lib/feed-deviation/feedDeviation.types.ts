/**
 * Feed-mixing deviation analysis – shared types.
 * Everything here is derived per analysis run; nothing is persisted.
 */

/** Logical columns every ingredient row must provide. */
export type RequiredColumn =
  | 'plannedKg'
  | 'realizedKg'
  | 'pctDifference'
  | 'foodType'
  | 'batchCode'
  | 'operator'
  | 'dietName'
  | 'date';

/**
 * Logical column -> source header in the uploaded sheet.
 * `food` (ingredient name) is optional; without it the food filter matches on foodType.
 */
export type ColumnMap = Record<RequiredColumn, string> & { food?: string };

/** One row as it comes out of the ingestion adapter (header -> cell). */
export type RawRow = Record<string, unknown>;

export type IngredientRecord = {
  batchCode: string;
  /** Food category used to look up the relative weight. */
  foodType: string;
  /** Ingredient name; used by the food filter. Falls back to foodType. */
  food: string;
  plannedKg: number;
  realizedKg: number;
  pctDifference: number;
  operator: string;
  dietName: string;
  /** ISO calendar date (YYYY-MM-DD). */
  date: string;
};

/** foodType -> weight fraction in [0, 1]. Need not sum to 1. */
export type RelativeWeightMap = Record<string, number>;

export type BatchAggregate = {
  readonly batchCode: string;
  readonly weightedAvgPct: number;
  readonly totalAdjustedQty: number;
  readonly totalContribution: number;
  /** Earliest ingredient date in the batch. */
  readonly date: string;
  readonly operator: string;
  readonly dietName: string;
  readonly ingredientCount: number;
};

export type OutlierBounds = {
  q1: number;
  q3: number;
  iqr: number;
  lowerBound: number;
  upperBound: number;
};

/** 'upper' drops only values above the fence; 'both' also drops values below the lower fence. */
export type OutlierMode = 'upper' | 'both';

export type HistogramColorClass = 'above-tolerance' | 'within-tolerance';

export type HistogramBin = {
  lowerEdge: number;
  upperEdge: number;
  count: number;
  colorClass: HistogramColorClass;
  /** 0..1 */
  intensity: number;
};

export type HistogramBinSet = {
  bins: HistogramBin[];
  binWidth: number;
  min: number | null;
  max: number | null;
  /** Sum of bin counts; equals the number of input values. */
  total: number;
  toleranceThreshold: number;
};

export type RangeBucket = {
  label: string;
  lower: number;
  /** null = open-ended */
  upper: number | null;
  count: number;
  percent: number;
};

export type StatisticsSummary = {
  countWith: number;
  countWithout: number;
  meanWith: number | null;
  meanWithout: number | null;
  medianWith: number | null;
  medianWithout: number | null;
  rangeBuckets: {
    withOutliers: RangeBucket[];
    withoutOutliers: RangeBucket[];
  };
};

/** Stable diagnostic codes for recovered conditions. */
export type AnalysisDiagnosticCode =
  | 'COERCION_WARNING'
  | 'DIVISION_UNDEFINED'
  | 'EMPTY_RESULT';

export type AnalysisDiagnostic = {
  code: AnalysisDiagnosticCode;
  severity: 'info' | 'warn';
  message: string;
  count?: number;
  batchCode?: string;
};

/** Categorical + date selection; 'ALL' or an empty list means no restriction. */
export type RecordSelection = {
  operators?: string[];
  foods?: string[];
  diets?: string[];
  /** Inclusive ISO date */
  startDate?: string;
  /** Inclusive ISO date */
  endDate?: string;
};

export type DeviationSeverity = 'within' | 'light' | 'intense' | 'critical';

export type ProcessedBatchRow = {
  batchCode: string;
  weightedAvgPct: number;
  date: string;
  operator: string;
  dietName: string;
  severity: DeviationSeverity;
};

export type StatisticsTableRow = {
  metric: string;
  withOutliers: number | null;
  withoutOutliers: number | null;
};
