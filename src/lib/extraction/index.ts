// ============================================================
// EPS CHART EXTRACTION - PUBLIC API
// ============================================================

export type {
  Fragment,
  BarColor,
  BarConfidence,
  ClassificationMethod,
  QuarterBox,
  MatchedPair,
  BarClassification,
  ClassifiedPair,
  ExtractionRecord,
  MatchOptions,
  GrayImage,
  BarRegion,
  ReportDate,
  WideRow,
  WideTable,
  ConfidenceRow,
} from './types';

export { QuarterLabel, DEFAULT_MATCH_OPTIONS } from './types';

export {
  normalizeQuarterText,
  extractQuarterPattern,
  extractNumber,
  isYearLike,
  compareQuarterKeys,
} from './quarters';

export { resolveReportDate, reportDateKey, isIsoReportDate } from './reportDate';

export {
  weightedDistance,
  findQuarterBoxes,
  findNumberForQuarter,
  matchQuartersWithNumbers,
} from './matching';

export {
  adaptiveThreshold,
  otsuThreshold,
  binarize,
  close3x3,
  whiteRatio,
} from './raster';

export {
  getBarRegion,
  preprocessForClassification,
  classifyBar,
  classifyAllBars,
  type PreprocessedChart,
} from './barClassifier';

export {
  formatEpsCell,
  toWideTable,
  mergeWideTables,
  mergeConfidenceRows,
  emptyWideTable,
} from './wideTable';

export { calculateBarScore, calculateConsistencyScore, calculateConfidence } from './confidence';

export { mergeExtractionResults, type MergedTables } from './timeSeries';
