// ============================================================
// WIDE / CONFIDENCE TABLE CODEC
// Persisted schema:
//   wide:       Report_Date, Q1'14, Q2'14, ...
//   confidence: Report_Date, Confidence
// ============================================================

import { validateConfidenceRows, validateWideRows } from '@/contracts';
import type { ConfidenceRow, WideTable } from '../extraction/types';
import { compareQuarterKeys } from '../extraction/quarters';
import { mergeWideTables, emptyWideTable } from '../extraction/wideTable';
import { TableStoreError } from '../errors';
import type { TableData } from './csv';

export const REPORT_DATE_COLUMN = 'Report_Date';
export const CONFIDENCE_COLUMN = 'Confidence';

function describeIssues(issues: Array<{ path: Array<string | number>; message: string }>): string {
  return issues.slice(0, 5).map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
}

/**
 * Validate and convert a stored wide table.
 * An invalid table is a storage failure: it must not be merged and re-saved.
 */
export function wideTableFromData(key: string, data: TableData): WideTable {
  // Older wide tables carried Confidence inline; it now lives in its own table
  const rows = data.rows.map(row => {
    const { [CONFIDENCE_COLUMN]: _legacy, ...rest } = row;
    return rest;
  });

  const result = validateWideRows(rows);
  if (!result.success) {
    throw new TableStoreError(key, `invalid wide table (${describeIssues(result.errors.issues)})`);
  }

  const quarters = data.columns
    .filter(c => c !== REPORT_DATE_COLUMN && c !== CONFIDENCE_COLUMN)
    .sort(compareQuarterKeys);

  const table: WideTable = {
    quarters,
    rows: result.data.map(({ Report_Date, ...cells }) => ({ reportDate: Report_Date, cells })),
  };

  // Normalizes order, duplicate dates and missing cells the same way a merge does
  return mergeWideTables(emptyWideTable(), table);
}

export function wideTableToData(table: WideTable): TableData {
  return {
    columns: [REPORT_DATE_COLUMN, ...table.quarters],
    rows: table.rows.map(row => ({ [REPORT_DATE_COLUMN]: row.reportDate, ...row.cells })),
  };
}

export function confidenceFromData(key: string, data: TableData): ConfidenceRow[] {
  const result = validateConfidenceRows(data.rows);
  if (!result.success) {
    throw new TableStoreError(key, `invalid confidence table (${describeIssues(result.errors.issues)})`);
  }
  return result.data.map(row => ({ reportDate: row.Report_Date, confidence: row.Confidence }));
}

export function confidenceToData(rows: ConfidenceRow[]): TableData {
  return {
    columns: [REPORT_DATE_COLUMN, CONFIDENCE_COLUMN],
    rows: rows.map(row => ({
      [REPORT_DATE_COLUMN]: row.reportDate,
      [CONFIDENCE_COLUMN]: row.confidence.toFixed(1),
    })),
  };
}
