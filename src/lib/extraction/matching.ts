// ============================================================
// EPS CHART EXTRACTION - COORDINATE MATCHING
// Pair each bottom-axis quarter label with the number above its bar
// ============================================================

import type { Fragment, MatchOptions, MatchedPair, QuarterBox } from './types';
import { DEFAULT_MATCH_OPTIONS } from './types';
import { extractNumber, extractQuarterPattern, isYearLike } from './quarters';

function centerX(box: Fragment): number {
  return box.left + box.width / 2;
}

function centerY(box: Fragment): number {
  return box.top + box.height / 2;
}

function sameBox(a: Fragment, b: Fragment): boolean {
  return a.left === b.left && a.top === b.top && a.width === b.width && a.height === b.height;
}

/**
 * Weighted distance between a quarter label and a number candidate.
 * Horizontal offset weighs 100x more than vertical: the number sits
 * straight above its bar at an arbitrary height.
 */
export function weightedDistance(xDiff: number, yDiff: number): number {
  return Math.sqrt(10 * xDiff ** 2 + 0.1 * yDiff ** 2);
}

/**
 * Find quarter labels in the bottom band of the chart, sorted left to right.
 * A fragment is in the band when its bottom edge reaches maxY * (1 - bottomPercent).
 */
export function findQuarterBoxes(fragments: Fragment[], bottomPercent: number = DEFAULT_MATCH_OPTIONS.bottomPercent): QuarterBox[] {
  if (fragments.length === 0) return [];

  const maxY = Math.max(...fragments.map(f => f.top + f.height));
  const threshold = maxY - maxY * bottomPercent;

  const boxes: QuarterBox[] = [];
  for (const fragment of fragments) {
    if (fragment.top + fragment.height < threshold) continue;
    const quarter = extractQuarterPattern(fragment.text);
    if (quarter) boxes.push({ fragment, quarter });
  }

  return boxes.sort((a, b) => a.fragment.left - b.fragment.left);
}

/**
 * Find the number label belonging to a quarter box.
 * Candidates must be numeric, below the year cutoff, not quarter labels,
 * strictly above the quarter box and within both tolerances.
 */
export function findNumberForQuarter(params: {
  quarterBox: Fragment;
  fragments: Fragment[];
  yTolerance?: number;
  xTolerance?: number;
}): { fragment: Fragment; value: number; distance: number } | null {
  const {
    quarterBox,
    fragments,
    yTolerance = DEFAULT_MATCH_OPTIONS.yTolerance,
    xTolerance = DEFAULT_MATCH_OPTIONS.xTolerance,
  } = params;

  const qx = centerX(quarterBox);
  const qy = centerY(quarterBox);

  let best: { fragment: Fragment; value: number; distance: number } | null = null;

  for (const fragment of fragments) {
    if (sameBox(fragment, quarterBox)) continue;
    if (extractQuarterPattern(fragment.text) !== null) continue;

    const value = extractNumber(fragment.text);
    if (value === null || isYearLike(value)) continue;

    const fy = centerY(fragment);
    if (fy >= qy) continue;

    const yDiff = qy - fy;
    if (yDiff > yTolerance) continue;

    const xDiff = Math.abs(centerX(fragment) - qx);
    if (xDiff > xTolerance) continue;

    const distance = weightedDistance(xDiff, yDiff);
    // Strict comparison keeps the earliest fragment on ties
    if (!best || distance < best.distance) {
      best = { fragment, value, distance };
    }
  }

  return best;
}

/**
 * Match every bottom-axis quarter label with its number label.
 * Quarter labels without a qualifying number are dropped, and only the
 * left-most pair is kept when a quarter label repeats.
 */
export function matchQuartersWithNumbers(fragments: Fragment[], options: Partial<MatchOptions> = {}): MatchedPair[] {
  const { bottomPercent, yTolerance, xTolerance } = { ...DEFAULT_MATCH_OPTIONS, ...options };

  const quarterBoxes = findQuarterBoxes(fragments, bottomPercent);
  const seen = new Set<string>();
  const pairs: MatchedPair[] = [];

  for (const { fragment, quarter } of quarterBoxes) {
    const key = quarter.toString();
    if (seen.has(key)) continue;

    const number = findNumberForQuarter({ quarterBox: fragment, fragments, yTolerance, xTolerance });
    if (!number) continue;

    seen.add(key);
    pairs.push({
      quarter,
      eps: number.value,
      quarterBox: fragment,
      numberBox: number.fragment,
      distance: number.distance,
    });
  }

  return pairs;
}
