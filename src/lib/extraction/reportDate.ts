import { format, isValid, parse } from 'date-fns';
import type { ReportDate } from './types';

/**
 * Resolve the publication date embedded in a report image filename,
 * e.g. "20251031-6.png" → 2025-10-31.
 */
export function resolveReportDate(filename: string): ReportDate {
  const match = /\d{8}/.exec(filename);
  if (!match) return { kind: 'unparsed', raw: filename };

  const date = parse(match[0], 'yyyyMMdd', new Date(0));
  if (!isValid(date)) return { kind: 'unparsed', raw: filename };

  return { kind: 'date', value: format(date, 'yyyy-MM-dd') };
}

/** Record key for a resolved date; the raw filename stands in when unparsed */
export function reportDateKey(date: ReportDate): string {
  return date.kind === 'date' ? date.value : date.raw;
}

export function isIsoReportDate(value: string): boolean {
  return /^\d{4}-\d{2}-\d{2}$/.test(value) && isValid(parse(value, 'yyyy-MM-dd', new Date(0)));
}
