import type { ConfidenceRow, ExtractionRecord, WideTable } from './types';
import { calculateConfidence } from './confidence';
import { mergeConfidenceRows, mergeWideTables, toWideTable } from './wideTable';

export interface MergedTables {
  wide: WideTable;
  confidence: ConfidenceRow[];
}

/**
 * Fold new long-form records into the accumulated tables.
 * Both tables are last-write-wins by report date; confidence is
 * computed only for the dates the new records carry.
 */
export function mergeExtractionResults(params: {
  existingWide: WideTable;
  existingConfidence: ConfidenceRow[];
  records: ExtractionRecord[];
}): MergedTables {
  const { existingWide, existingConfidence, records } = params;
  if (records.length === 0) {
    return { wide: existingWide, confidence: existingConfidence };
  }

  const wide = mergeWideTables(existingWide, toWideTable(records));
  const confidence = mergeConfidenceRows(existingConfidence, calculateConfidence(records, wide));

  return { wide, confidence };
}
