/**
 * Record normalizer: raw sheet rows -> typed IngredientRecord[].
 * Columns are resolved once by header name here; later stages never see raw rows.
 */

import { addDays, format, isValid, parse, parseISO } from 'date-fns';
import { MissingColumnError } from '@/src/lib/errors/app-error';
import type {
  AnalysisDiagnostic,
  ColumnMap,
  IngredientRecord,
  RawRow,
  RequiredColumn,
} from './feedDeviation.types';

const REQUIRED_COLUMNS: RequiredColumn[] = [
  'plannedKg',
  'realizedKg',
  'pctDifference',
  'foodType',
  'batchCode',
  'operator',
  'dietName',
  'date',
];

const NUMERIC_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

const DATE_FORMATS = ['dd/MM/yyyy', 'dd/MM/yyyy HH:mm', 'dd/MM/yyyy HH:mm:ss'];

/** Excel day 0 (serial numbers count from here, including the 1900 leap-year bug). */
const EXCEL_EPOCH = new Date(1899, 11, 30);

export type NormalizeOptions = {
  /** Header row of the sheet; defaults to the union of row keys. */
  headers?: string[];
};

export type NormalizeResult = {
  records: IngredientRecord[];
  /** Zero-based indices into the input rows that were dropped. */
  droppedRowIndices: number[];
  diagnostics: AnalysisDiagnostic[];
};

/** Numeric coercion; undefined means "missing" (never 0). */
export function coerceNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'string') {
    const s = value.trim();
    if (!NUMERIC_PATTERN.test(s)) return undefined;
    const n = Number(s);
    return Number.isFinite(n) ? n : undefined;
  }
  return undefined;
}

/** Calendar date as YYYY-MM-DD, or undefined when the cell cannot be read as a date. */
export function coerceDate(value: unknown): string | undefined {
  if (value instanceof Date) {
    return isValid(value) ? format(value, 'yyyy-MM-dd') : undefined;
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value <= 0) return undefined;
    return format(addDays(EXCEL_EPOCH, Math.floor(value)), 'yyyy-MM-dd');
  }
  if (typeof value !== 'string') return undefined;
  const s = value.trim();
  if (!s) return undefined;
  if (/^\d{4}-\d{2}-\d{2}/.test(s)) {
    const d = parseISO(s);
    return isValid(d) ? format(d, 'yyyy-MM-dd') : undefined;
  }
  for (const fmt of DATE_FORMATS) {
    const d = parse(s, fmt, EXCEL_EPOCH);
    if (isValid(d)) return format(d, 'yyyy-MM-dd');
  }
  return undefined;
}

function coerceText(value: unknown): string {
  if (value == null) return '';
  if (value instanceof Date) return isValid(value) ? value.toISOString() : '';
  return String(value).trim();
}

/** Headers the column map needs that the sheet does not have. */
export function findMissingColumns(
  headers: Iterable<string>,
  columnMap: ColumnMap,
): string[] {
  const present = new Set(headers);
  const missing: string[] = [];
  for (const key of REQUIRED_COLUMNS) {
    const header = columnMap[key];
    if (!present.has(header)) missing.push(header);
  }
  if (columnMap.food && !present.has(columnMap.food)) {
    missing.push(columnMap.food);
  }
  return missing;
}

function collectHeaders(rows: readonly RawRow[]): Set<string> {
  const headers = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) headers.add(key);
  }
  return headers;
}

/**
 * Validate and coerce rows. Throws MissingColumnError when a mapped header is absent;
 * rows with non-numeric quantities/percentages, unreadable dates or no batch code are
 * dropped and reported as one COERCION_WARNING.
 */
export function normalizeRecords(
  rows: readonly RawRow[],
  columnMap: ColumnMap,
  options: NormalizeOptions = {},
): NormalizeResult {
  const headers = options.headers ?? collectHeaders(rows);
  const missing = findMissingColumns(headers, columnMap);
  if (missing.length > 0) {
    throw new MissingColumnError(missing);
  }

  const records: IngredientRecord[] = [];
  const droppedRowIndices: number[] = [];

  rows.forEach((row, idx) => {
    const plannedKg = coerceNumber(row[columnMap.plannedKg]);
    const realizedKg = coerceNumber(row[columnMap.realizedKg]);
    const pctDifference = coerceNumber(row[columnMap.pctDifference]);
    const date = coerceDate(row[columnMap.date]);
    const batchCode = coerceText(row[columnMap.batchCode]);
    if (
      plannedKg === undefined ||
      realizedKg === undefined ||
      pctDifference === undefined ||
      date === undefined ||
      !batchCode
    ) {
      droppedRowIndices.push(idx);
      return;
    }
    const foodType = coerceText(row[columnMap.foodType]);
    records.push({
      batchCode,
      foodType,
      food: columnMap.food ? coerceText(row[columnMap.food]) : foodType,
      plannedKg,
      realizedKg,
      pctDifference,
      operator: coerceText(row[columnMap.operator]),
      dietName: coerceText(row[columnMap.dietName]),
      date,
    });
  });

  const diagnostics: AnalysisDiagnostic[] = [];
  if (droppedRowIndices.length > 0) {
    diagnostics.push({
      code: 'COERCION_WARNING',
      severity: 'warn',
      message: `Dropped ${droppedRowIndices.length} row(s) with missing or non-numeric values`,
      count: droppedRowIndices.length,
    });
  }

  return { records, droppedRowIndices, diagnostics };
}
