// ============================================================
// EPS CHART EXTRACTION - ROW CONFIDENCE
// Deterministic 0-100 score per report date:
//   50% bar-classification agreement + 50% week-over-week stability of actuals
// ============================================================

import type { BarConfidence, ConfidenceRow, ExtractionRecord, WideTable } from './types';
import { parseActualCell } from './wideTable';

export const BAR_SCORES: Record<BarConfidence, number> = {
  high: 100,
  medium: 67,
  low: 33,
};

/** Relative change between consecutive weeks still counted as consistent */
export const CONSISTENCY_TOLERANCE = 0.2;

/** One decimal, ties to even (33.25 → 33.2, 66.75 → 66.8) */
export function roundToTenth(value: number): number {
  const scaled = value * 10;
  const floor = Math.floor(scaled);
  if (Math.abs(scaled - floor - 0.5) < 1e-9) {
    return (floor % 2 === 0 ? floor : floor + 1) / 10;
  }
  return Math.round(scaled) / 10;
}

/**
 * Mean bar score over the records of one report date; 0 when there are none
 */
export function calculateBarScore(records: ExtractionRecord[]): number {
  if (records.length === 0) return 0;
  const total = records.reduce((sum, r) => sum + (BAR_SCORES[r.barConfidence] ?? 0), 0);
  return total / records.length;
}

export function isConsistent(current: number, previous: number): boolean {
  return Math.abs(current - previous) / Math.max(Math.abs(previous), 0.01) <= CONSISTENCY_TOLERANCE;
}

/**
 * Share of actual (dark-bar) quarters whose value agrees with the
 * immediately preceding report date.
 *
 * - first report date of the table → 100
 * - no preceding row, no actual quarters, or nothing comparable → 0
 * - estimates on either side are skipped
 */
export function calculateConsistencyScore(params: {
  reportDate: string;
  records: ExtractionRecord[];
  table: WideTable;
}): number {
  const { reportDate, records, table } = params;
  if (table.rows.length === 0) return 0;

  if (table.rows[0].reportDate === reportDate) return 100;

  const currentIndex = table.rows.findIndex(row => row.reportDate === reportDate);
  if (currentIndex <= 0) return 0;

  const current = table.rows[currentIndex];
  const previous = table.rows[currentIndex - 1];

  const actualQuarters = new Set(records.filter(r => r.barColor === 'dark').map(r => r.quarter));
  if (actualQuarters.size === 0) return 0;

  const columns = new Set(table.quarters);
  let matches = 0;
  let total = 0;

  for (const quarter of actualQuarters) {
    if (!columns.has(quarter)) continue;

    const curr = parseActualCell(current.cells[quarter]);
    const prev = parseActualCell(previous.cells[quarter]);
    if (curr === null || prev === null) continue;

    total++;
    if (isConsistent(curr, prev)) matches++;
  }

  return total > 0 ? (matches / total) * 100 : 0;
}

/**
 * Confidence rows for every report date among the new records,
 * scored against the merged table.
 */
export function calculateConfidence(records: ExtractionRecord[], table: WideTable): ConfidenceRow[] {
  const byDate = new Map<string, ExtractionRecord[]>();
  for (const record of records) {
    const group = byDate.get(record.reportDate) ?? [];
    group.push(record);
    byDate.set(record.reportDate, group);
  }

  const rows: ConfidenceRow[] = [];
  for (const [reportDate, group] of byDate) {
    if (!table.rows.some(row => row.reportDate === reportDate)) continue;

    const barScore = calculateBarScore(group);
    const consistencyScore = calculateConsistencyScore({ reportDate, records: group, table });
    rows.push({ reportDate, confidence: roundToTenth(0.5 * barScore + 0.5 * consistencyScore) });
  }

  return rows;
}
