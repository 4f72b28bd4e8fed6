import { z } from 'zod';

// ============================================================
// EPS CHART RECORD CONTRACTS v1.0
// Shapes crossing the OCR and table-storage boundaries
// ============================================================

/** Canonical quarter column key, e.g. Q1'17 */
export const QUARTER_KEY_PATTERN = /^Q[1-4]'\d{2}$/;

/** Wide-table cell: empty, a decimal, or a decimal marked as estimate with `*` */
export const EPS_CELL_PATTERN = /^(-?\d+(\.\d+)?\*?)?$/;

export const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

// ============================================================
// OCR FRAGMENT SCHEMA
// ============================================================

const pixel = z.number().finite().nonnegative();

export const FragmentSchema = z.object({
  text: z.string(),
  left: pixel,
  top: pixel,
  width: pixel,
  height: pixel,
  confidence: z.number().min(0).max(100),
}).strict();

export type Fragment = z.infer<typeof FragmentSchema>;

// ============================================================
// PERSISTED TABLE ROW SCHEMAS
// ============================================================

/**
 * Wide row as stored: Report_Date plus one column per quarter.
 * Unknown keys are quarter columns and must hold a valid EPS cell.
 */
export const WideRowSchema = z.object({
  Report_Date: z.string().regex(ISO_DATE_PATTERN, 'Report_Date must be YYYY-MM-DD'),
}).catchall(z.string().regex(EPS_CELL_PATTERN, 'cell must be empty, a decimal, or a decimal followed by *'))
  .superRefine((row, ctx) => {
    for (const key of Object.keys(row)) {
      if (key === 'Report_Date') continue;
      if (!QUARTER_KEY_PATTERN.test(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Column "${key}" is not a quarter label`,
          path: [key],
        });
      }
    }
  });

export type WideRowShape = z.infer<typeof WideRowSchema>;

export const ConfidenceRowSchema = z.object({
  Report_Date: z.string().regex(ISO_DATE_PATTERN, 'Report_Date must be YYYY-MM-DD'),
  Confidence: z.preprocess(
    value => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    z.coerce.number().min(0).max(100),
  ),
}).strict();

export type ConfidenceRowShape = z.infer<typeof ConfidenceRowSchema>;

// ============================================================
// VALIDATION HELPERS
// ============================================================

export function validateFragments(data: unknown): { success: true; data: Fragment[] } | { success: false; errors: z.ZodError } {
  const result = z.array(FragmentSchema).safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: result.error };
}

export function validateWideRows(data: unknown): { success: true; data: WideRowShape[] } | { success: false; errors: z.ZodError } {
  const result = z.array(WideRowSchema).safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: result.error };
}

export function validateConfidenceRows(data: unknown): { success: true; data: ConfidenceRowShape[] } | { success: false; errors: z.ZodError } {
  const result = z.array(ConfidenceRowSchema).safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: result.error };
}
