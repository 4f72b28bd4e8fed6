// ============================================================
// EPS CHART EXTRACTION - BAR FILL CLASSIFICATION
// Three thresholding methods vote dark (actual) vs light (estimate)
// ============================================================

import type {
  BarClassification,
  BarColor,
  BarConfidence,
  BarRegion,
  ClassificationMethod,
  ClassifiedPair,
  Fragment,
  GrayImage,
  MatchedPair,
} from './types';
import { adaptiveThreshold, binarize, close3x3, otsuThreshold, whiteRatio } from './raster';

/** Fixed width of the sampled strip centred on the bar */
export const BAR_REGION_WIDTH = 30;

export interface PreprocessedChart {
  adaptive: GrayImage;
  closing: GrayImage;
  otsu_inv: GrayImage;
}

/**
 * Derive the three binary images once per chart:
 * adaptive Gaussian (block 11, C=2), Otsu + 3x3 closing, inverted Otsu.
 */
export function preprocessForClassification(gray: GrayImage): PreprocessedChart {
  const otsu = otsuThreshold(gray);
  return {
    adaptive: adaptiveThreshold(gray, 11, 2),
    closing: close3x3(binarize(gray, otsu)),
    otsu_inv: binarize(gray, otsu, true),
  };
}

/**
 * Region between the bottom of the number label and the top of the quarter label,
 * BAR_REGION_WIDTH wide around the midpoint of their horizontal centres.
 */
export function getBarRegion(quarterBox: Fragment, numberBox: Fragment, imageWidth: number): BarRegion {
  const qx = quarterBox.left + quarterBox.width / 2;
  const nx = numberBox.left + numberBox.width / 2;
  const xCenter = Math.trunc((qx + nx) / 2);

  return {
    xMin: Math.max(0, Math.trunc(xCenter - BAR_REGION_WIDTH / 2)),
    xMax: Math.min(imageWidth, Math.trunc(xCenter + BAR_REGION_WIDTH / 2)),
    yTop: Math.trunc(numberBox.top + numberBox.height),
    yBottom: Math.trunc(quarterBox.top),
  };
}

/** Adaptive threshold: mostly white ⇒ dark */
export function classifyAdaptive(ratio: number, threshold: number = 0.7): BarColor {
  return ratio > threshold ? 'dark' : 'light';
}

/** Closing fills hatching, so a mostly white closed region ⇒ light */
export function classifyClosing(ratio: number, threshold: number = 0.5): BarColor {
  return ratio > threshold ? 'light' : 'dark';
}

/** Inverted Otsu: mostly white ⇒ dark */
export function classifyOtsuInverted(ratio: number, threshold: number = 0.7): BarColor {
  return ratio > threshold ? 'dark' : 'light';
}

export function confidenceFromVotes(winningVotes: number): BarConfidence {
  if (winningVotes === 3) return 'high';
  if (winningVotes === 2) return 'medium';
  return 'low';
}

function degenerateClassification(): BarClassification {
  return { barColor: 'light', barConfidence: 'low', barVotes: { dark: 0, light: 0 }, barMethods: {} };
}

/**
 * Classify one bar from the preprocessed images.
 * An empty region skips the vote and defaults to light/low.
 */
export function classifyBar(preprocessed: PreprocessedChart, region: BarRegion): BarClassification {
  const ratios = {
    adaptive: whiteRatio(preprocessed.adaptive, region),
    closing: whiteRatio(preprocessed.closing, region),
    otsu_inv: whiteRatio(preprocessed.otsu_inv, region),
  };
  if (ratios.adaptive === null || ratios.closing === null || ratios.otsu_inv === null) {
    return degenerateClassification();
  }

  const methods: Record<ClassificationMethod, BarColor> = {
    adaptive: classifyAdaptive(ratios.adaptive),
    closing: classifyClosing(ratios.closing),
    otsu_inv: classifyOtsuInverted(ratios.otsu_inv),
  };

  const votes = { dark: 0, light: 0 };
  for (const color of Object.values(methods)) votes[color]++;

  const barColor: BarColor = votes.dark > votes.light ? 'dark' : 'light';

  return {
    barColor,
    barConfidence: confidenceFromVotes(votes[barColor]),
    barVotes: votes,
    barMethods: methods,
  };
}

/**
 * Attach a bar classification to every matched pair of one chart
 */
export function classifyAllBars(gray: GrayImage, pairs: MatchedPair[]): ClassifiedPair[] {
  if (pairs.length === 0) return [];

  const preprocessed = preprocessForClassification(gray);
  return pairs.map(pair => ({
    ...pair,
    ...classifyBar(preprocessed, getBarRegion(pair.quarterBox, pair.numberBox, gray.width)),
  }));
}
