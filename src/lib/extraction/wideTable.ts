// ============================================================
// EPS CHART EXTRACTION - WIDE TABLE
// Long records → one row per report date, one column per quarter
// ============================================================

import type { BarColor, ConfidenceRow, ExtractionRecord, WideRow, WideTable } from './types';
import { compareQuarterKeys } from './quarters';

export const ESTIMATE_MARKER = '*';

export function emptyWideTable(): WideTable {
  return { quarters: [], rows: [] };
}

/** Decimal text without exponent notation (5e-7 → "0.0000005") */
function plainDecimal(value: number): string {
  const text = String(value);
  if (!/e/i.test(text)) return text;
  return value.toLocaleString('en-US', { useGrouping: false, maximumFractionDigits: 20 });
}

/**
 * Cell text for one EPS value; estimates (light bars) carry a trailing `*`.
 * Whole numbers keep one decimal so stored tables read uniformly (28 → "28.0").
 */
export function formatEpsCell(eps: number, barColor: BarColor): string {
  const text = Number.isInteger(eps) ? `${plainDecimal(eps)}.0` : plainDecimal(eps);
  return barColor === 'light' ? `${text}${ESTIMATE_MARKER}` : text;
}

export function isEstimateCell(cell: string): boolean {
  return cell.includes(ESTIMATE_MARKER);
}

/**
 * Numeric value of an actual (non-estimate) cell; null when empty, estimated or unreadable
 */
export function parseActualCell(cell: string | undefined): number | null {
  if (!cell || isEstimateCell(cell)) return null;
  const value = Number(cell);
  return Number.isFinite(value) ? value : null;
}

function compareDates(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function sortQuarters(quarters: Iterable<string>): string[] {
  return [...new Set(quarters)].sort(compareQuarterKeys);
}

function fillRow(row: WideRow, quarters: string[]): WideRow {
  const cells: Record<string, string> = {};
  for (const quarter of quarters) {
    cells[quarter] = row.cells[quarter] ?? '';
  }
  return { reportDate: row.reportDate, cells };
}

/**
 * Pivot long records into a wide table.
 * When two records share (reportDate, quarter), the first one encountered wins.
 */
export function toWideTable(records: ExtractionRecord[]): WideTable {
  const byDate = new Map<string, Record<string, string>>();

  for (const record of records) {
    let cells = byDate.get(record.reportDate);
    if (!cells) {
      cells = {};
      byDate.set(record.reportDate, cells);
    }
    if (record.quarter in cells) continue;
    cells[record.quarter] = formatEpsCell(record.eps, record.barColor);
  }

  const quarters = sortQuarters(records.map(r => r.quarter));
  const rows = [...byDate.entries()]
    .map(([reportDate, cells]) => fillRow({ reportDate, cells }, quarters))
    .sort((a, b) => compareDates(a.reportDate, b.reportDate));

  return { quarters, rows };
}

/**
 * Keep the last row for each key, then sort ascending by key
 */
export function lastWriteWins<T>(rows: T[], keyOf: (row: T) => string): T[] {
  const byKey = new Map<string, T>();
  for (const row of rows) {
    byKey.delete(keyOf(row));
    byKey.set(keyOf(row), row);
  }
  return [...byKey.values()].sort((a, b) => compareDates(keyOf(a), keyOf(b)));
}

/**
 * Merge incoming rows over an existing table.
 * A report date present in both is replaced wholesale by the incoming row.
 */
export function mergeWideTables(existing: WideTable, incoming: WideTable): WideTable {
  const quarters = sortQuarters([...existing.quarters, ...incoming.quarters]);
  const rows = lastWriteWins([...existing.rows, ...incoming.rows], row => row.reportDate)
    .map(row => fillRow(row, quarters));

  return { quarters, rows };
}

export function mergeConfidenceRows(existing: ConfidenceRow[], incoming: ConfidenceRow[]): ConfidenceRow[] {
  return lastWriteWins([...existing, ...incoming], row => row.reportDate);
}
