/**
 * Workbook ingestion: .xlsx / .csv export -> header row + RawRow[].
 * Applies the sheet layout (leading rows to skip, first column to drop, columns to
 * remove). Does not coerce values; that is the normalizer's job.
 */

import * as XLSX from 'xlsx';
import { AppError } from '@/src/lib/errors/app-error';
import type { SheetLayout } from '../feedDeviation.schemas';
import type { RawRow } from '../feedDeviation.types';

export type SheetRows = {
  /** Distinct header names in column order (first occurrence position). */
  headers: string[];
  rows: RawRow[];
};

function isBlank(cell: unknown): boolean {
  return cell == null || (typeof cell === 'string' && cell.trim() === '');
}

/**
 * Build rows from a cell matrix. When a header repeats, the value from its last
 * column wins: exports repeat the planned-quantity header and the last one holds the data.
 */
export function rowsFromMatrix(
  matrix: readonly (readonly unknown[])[],
  layout: SheetLayout,
): SheetRows {
  const body = matrix
    .slice(layout.skipRows)
    .map((row) => (layout.removeFirstColumn ? row.slice(1) : [...row]))
    .filter((row) => !row.every(isBlank));
  if (body.length === 0) return { headers: [], rows: [] };

  const removed = new Set(layout.columnsToRemove);
  const headerCells = body[0].map((h) => (isBlank(h) ? '' : String(h).trim()));
  const headers: string[] = [];
  for (const h of headerCells) {
    if (h && !removed.has(h) && !headers.includes(h)) headers.push(h);
  }

  const rows: RawRow[] = [];
  for (const cells of body.slice(1)) {
    const row: RawRow = {};
    headerCells.forEach((h, i) => {
      if (!h || removed.has(h)) return;
      row[h] = cells[i] ?? null;
    });
    rows.push(row);
  }
  return { headers, rows };
}

/**
 * Parse a workbook (xlsx, xls or csv bytes) and read one sheet (default: the first).
 * Text formats are read as strings (`raw`): SheetJS would otherwise read `01/02/2024`
 * month-first, while the normalizer reads day-first.
 */
export function readWorkbookRows(
  data: Uint8Array,
  layout: SheetLayout,
  sheetName?: string,
): SheetRows {
  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(data, { type: 'array', cellDates: true, raw: true });
  } catch (err) {
    throw new AppError('INGEST_ERROR', 'Could not read the workbook.', err);
  }
  const name = sheetName ?? workbook.SheetNames[0];
  const sheet = name ? workbook.Sheets[name] : undefined;
  if (!sheet) {
    throw new AppError(
      'INGEST_ERROR',
      sheetName
        ? `Sheet "${sheetName}" not found in workbook.`
        : 'Workbook has no sheets.',
    );
  }
  const matrix = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    raw: true,
    defval: null,
    blankrows: false,
  });
  return rowsFromMatrix(matrix, layout);
}
