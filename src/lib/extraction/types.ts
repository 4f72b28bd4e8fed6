// ============================================================
// EPS CHART EXTRACTION - TYPES
// ============================================================

import type { Fragment } from '@/contracts';

export type { Fragment };

/** Bar fill: dark = reported actual, light = analyst estimate */
export type BarColor = 'dark' | 'light';

/** Agreement level of the three thresholding methods */
export type BarConfidence = 'high' | 'medium' | 'low';

export type ClassificationMethod = 'adaptive' | 'closing' | 'otsu_inv';

/**
 * Fiscal quarter label, canonical form Q{1-4}'{YY}.
 * Two-digit years below 50 map to 20YY, the rest to 19YY.
 */
export class QuarterLabel {
  readonly quarter: number;
  readonly yy: number;

  constructor(quarter: number, yy: number) {
    if (!Number.isInteger(quarter) || quarter < 1 || quarter > 4) {
      throw new RangeError(`Quarter must be 1-4, got ${quarter}`);
    }
    if (!Number.isInteger(yy) || yy < 0 || yy > 99) {
      throw new RangeError(`Two-digit year must be 0-99, got ${yy}`);
    }
    this.quarter = quarter;
    this.yy = yy;
  }

  get year(): number {
    return this.yy < 50 ? 2000 + this.yy : 1900 + this.yy;
  }

  toString(): string {
    return `Q${this.quarter}'${String(this.yy).padStart(2, '0')}`;
  }

  /** Parse the canonical form only; OCR variants go through extractQuarterPattern */
  static parse(text: string): QuarterLabel | null {
    const match = /^Q([1-4])'(\d{2})$/.exec(text);
    if (!match) return null;
    return new QuarterLabel(Number(match[1]), Number(match[2]));
  }

  static compare(a: QuarterLabel, b: QuarterLabel): number {
    return a.year - b.year || a.quarter - b.quarter;
  }
}

/** Quarter label fragment found in the bottom band of a chart */
export interface QuarterBox {
  fragment: Fragment;
  quarter: QuarterLabel;
}

/** A quarter label paired with the numeric label above its bar */
export interface MatchedPair {
  quarter: QuarterLabel;
  eps: number;
  quarterBox: Fragment;
  numberBox: Fragment;
  /** Weighted distance used to pick numberBox; diagnostic only */
  distance: number;
}

export interface BarClassification {
  barColor: BarColor;
  barConfidence: BarConfidence;
  barVotes: { dark: number; light: number };
  barMethods: Partial<Record<ClassificationMethod, BarColor>>;
}

export type ClassifiedPair = MatchedPair & BarClassification;

/** One quarter observed on one report image (long form) */
export interface ExtractionRecord {
  /** ISO date from the filename, or the raw filename when no date could be read */
  reportDate: string;
  quarter: string;
  eps: number;
  isEstimate: boolean;
  barColor: BarColor;
  barConfidence: BarConfidence;
}

export interface MatchOptions {
  bottomPercent: number;
  yTolerance: number;
  /** Tight by default; wide or shifted chart layouts may need more */
  xTolerance: number;
}

export const DEFAULT_MATCH_OPTIONS: MatchOptions = {
  bottomPercent: 0.3,
  yTolerance: 1000,
  xTolerance: 10,
};

/** 8-bit single-channel raster, row-major */
export interface GrayImage {
  width: number;
  height: number;
  data: Uint8Array;
}

/** Inclusive-exclusive pixel bounds of a bar region */
export interface BarRegion {
  xMin: number;
  xMax: number;
  yTop: number;
  yBottom: number;
}

export type ReportDate =
  | { kind: 'date'; value: string }
  | { kind: 'unparsed'; raw: string };

/** One report date; every known quarter column has a cell, empty when unseen */
export interface WideRow {
  reportDate: string;
  cells: Record<string, string>;
}

/** Report dates ascending, quarter columns in chronological order */
export interface WideTable {
  quarters: string[];
  rows: WideRow[];
}

export interface ConfidenceRow {
  reportDate: string;
  /** 0-100, one decimal place */
  confidence: number;
}
