import { z } from 'zod';
import { ConfigError } from './errors';
import type { Level } from './logger';
import type { MatchOptions } from './extraction/types';

// ============================================================
// RUN CONFIGURATION
// Read from the environment once at the entry point
// ============================================================

const optionalString = z.preprocess(v => (v === '' ? undefined : v), z.string().optional());

const EnvSchema = z.object({
  GOOGLE_VISION_API_KEY: optionalString,
  OCR_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

  TABLE_STORE: z.enum(['supabase', 'file']).default('supabase'),
  SUPABASE_URL: optionalString.pipe(z.string().url().optional()),
  SUPABASE_SERVICE_ROLE_KEY: optionalString,
  EPS_TABLE_BUCKET: z.string().min(1).default('eps-tables'),
  TABLE_DIR: z.string().min(1).default('output'),

  CHART_DIR: z.string().min(1).default('charts'),

  MATCH_BOTTOM_PERCENT: z.coerce.number().gt(0).lte(1).default(0.3),
  MATCH_Y_TOLERANCE: z.coerce.number().positive().default(1000),
  MATCH_X_TOLERANCE: z.coerce.number().positive().default(10),

  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_TABLE: optionalString,
}).superRefine((env, ctx) => {
  if (env.TABLE_STORE !== 'supabase') return;
  if (!env.SUPABASE_URL) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['SUPABASE_URL'], message: 'required when TABLE_STORE=supabase' });
  }
  if (!env.SUPABASE_SERVICE_ROLE_KEY) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['SUPABASE_SERVICE_ROLE_KEY'], message: 'required when TABLE_STORE=supabase' });
  }
});

export type TableStoreConfig =
  | { kind: 'supabase'; url: string; serviceKey: string; bucket: string }
  | { kind: 'file'; directory: string };

export interface AppConfig {
  ocr: { apiKey: string | undefined; timeoutMs: number };
  tables: TableStoreConfig;
  chartDir: string;
  matching: MatchOptions;
  logging: { level: Level; table: string | undefined };
}

/**
 * Parse and validate configuration; every invalid variable is reported at once
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`));
  }
  const e = result.data;

  const tables: TableStoreConfig = e.TABLE_STORE === 'supabase' && e.SUPABASE_URL && e.SUPABASE_SERVICE_ROLE_KEY
    ? { kind: 'supabase', url: e.SUPABASE_URL, serviceKey: e.SUPABASE_SERVICE_ROLE_KEY, bucket: e.EPS_TABLE_BUCKET }
    : { kind: 'file', directory: e.TABLE_DIR };

  return {
    ocr: { apiKey: e.GOOGLE_VISION_API_KEY, timeoutMs: e.OCR_TIMEOUT_MS },
    tables,
    chartDir: e.CHART_DIR,
    matching: {
      bottomPercent: e.MATCH_BOTTOM_PERCENT,
      yTolerance: e.MATCH_Y_TOLERANCE,
      xTolerance: e.MATCH_X_TOLERANCE,
    },
    logging: { level: e.LOG_LEVEL, table: e.LOG_TABLE },
  };
}
