// ============================================================
// EPS CHART CONTRACTS - PUBLIC API
// ============================================================

export {
  FragmentSchema,
  WideRowSchema,
  ConfidenceRowSchema,
  QUARTER_KEY_PATTERN,
  EPS_CELL_PATTERN,
  ISO_DATE_PATTERN,
  validateFragments,
  validateWideRows,
  validateConfidenceRows,
  type Fragment,
  type WideRowShape,
  type ConfidenceRowShape,
} from './records';
