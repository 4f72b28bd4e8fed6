// ============================================================
// EPS CHART EXTRACTION - QUARTER LABELS + NUMBER CANDIDATES
// Compensates for the OCR confusions seen on chart axes
// ============================================================

import { QuarterLabel } from './types';

/** Four-digit values at or above this are axis years, not EPS */
export const YEAR_LIKE_MIN = 2000;

/**
 * Quarter patterns in priority order; first match wins.
 * Each resolver returns null when the year guard rejects the match.
 */
const QUARTER_PATTERNS: Array<{ pattern: RegExp; resolve: (m: RegExpExecArray) => QuarterLabel | null }> = [
  // Q1'17
  { pattern: /Q([1-4])'(\d{2})/i, resolve: m => label(m[1], m[2]) },
  // Q1 2017
  { pattern: /Q([1-4])\s+20(\d{2})/i, resolve: m => label(m[1], m[2]) },
  // Q117 (apostrophe dropped)
  { pattern: /Q([1-4])(\d{2})/i, resolve: m => guardedLabel(m[1], m[2]) },
  // 0117 / O117 (Q read as zero or letter O)
  { pattern: /[0Oo]([1-4])(\d{2})/, resolve: m => guardedLabel(m[1], m[2]) },
  // Q1i7y ('1 read as i/I/l, trailing glyph read as y/i)
  { pattern: /Q([1-4])[iIl1](\d)[yi]/i, resolve: m => label(m[1], expandYearDigit(m[2])) },
];

function label(quarter: string, yy: string): QuarterLabel {
  return new QuarterLabel(Number(quarter), Number(yy));
}

function isPlausibleYear(yy: number): boolean {
  return (yy >= 14 && yy <= 99) || (yy >= 0 && yy <= 25);
}

function guardedLabel(quarter: string, yy: string): QuarterLabel | null {
  return isPlausibleYear(Number(yy)) ? label(quarter, yy) : null;
}

/** Single surviving year digit: 7-9 belong to the 2010s, anything else to the 2020s */
function expandYearDigit(digit: string): string {
  return ['7', '8', '9'].includes(digit) ? `1${digit}` : `2${digit}`;
}

/**
 * Rewrite the two most common misreads before pattern matching:
 * a leading O/0 standing in for Q, and I/l standing in for 1 after Q.
 */
export function normalizeQuarterText(text: string): string {
  return text
    .replace(/^[O0](?=[1-4])/i, 'Q')
    .replace(/Q[Il](?=\d)/gi, 'Q1');
}

/**
 * Normalize an OCR fragment and extract a quarter label.
 * Returns null for the (common) fragments that are not quarter labels.
 */
export function extractQuarterPattern(text: string): QuarterLabel | null {
  const normalized = normalizeQuarterText(text);

  for (const { pattern, resolve } of QUARTER_PATTERNS) {
    const match = pattern.exec(normalized);
    if (!match) continue;
    const quarter = resolve(match);
    if (quarter) return quarter;
  }

  return null;
}

/**
 * Extract the first number in a fragment.
 * Thousands separators and minus signs are stripped first.
 */
export function extractNumber(text: string): number | null {
  const cleaned = text.replace(/,/g, '').replace(/-/g, '');
  const match = /\d+\.?\d*/.exec(cleaned);
  if (!match) return null;

  const value = Number.parseFloat(match[0]);
  return Number.isFinite(value) ? value : null;
}

export function isYearLike(value: number): boolean {
  return value >= YEAR_LIKE_MIN;
}

/**
 * Chronological comparator for wide-table column keys.
 * Keys that are not canonical quarter labels sort first.
 */
export function compareQuarterKeys(a: string, b: string): number {
  const qa = QuarterLabel.parse(a);
  const qb = QuarterLabel.parse(b);
  if (!qa || !qb) {
    if (qa) return 1;
    if (qb) return -1;
    return 0;
  }
  return QuarterLabel.compare(qa, qb);
}
