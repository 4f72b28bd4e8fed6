// EPS chart extraction run: every chart image in CHART_DIR, oldest first.
//
//   tsx src/run.ts [--limit N] [--reprocess]

import { config as loadEnv } from 'dotenv';
import { parseArgs } from 'node:util';
import { createServiceClient } from '@/integrations/supabase/client';
import { loadConfig, type AppConfig } from '@/lib/config';
import { ConfigError } from '@/lib/errors';
import { consoleSink, createLogger, supabaseSink, type LogSink } from '@/lib/logger';
import { VisionOcrClient } from '@/lib/ocr/visionClient';
import { listChartImages, processCharts } from '@/lib/processor';
import { FileTableStore, SupabaseTableStore, type TableStore } from '@/lib/storage/tableStore';

loadEnv({ path: ['.env.local', '.env'] });

function buildStore(config: AppConfig): TableStore {
  const tables = config.tables;
  if (tables.kind === 'file') return new FileTableStore(tables.directory);
  return new SupabaseTableStore(createServiceClient(tables.url, tables.serviceKey), tables.bucket);
}

function buildSinks(config: AppConfig): LogSink[] {
  const sinks: LogSink[] = [consoleSink];
  if (config.logging.table && config.tables.kind === 'supabase') {
    const client = createServiceClient(config.tables.url, config.tables.serviceKey);
    sinks.push(supabaseSink(client, config.logging.table));
  }
  return sinks;
}

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      limit: { type: 'string' },
      reprocess: { type: 'boolean', default: false },
    },
  });

  const config = loadConfig();
  if (!config.ocr.apiKey) {
    throw new ConfigError(['GOOGLE_VISION_API_KEY: required to run OCR']);
  }

  const limit = values.limit === undefined ? undefined : Number(values.limit);
  if (limit !== undefined && (!Number.isInteger(limit) || limit < 0)) {
    throw new ConfigError([`--limit: expected a non-negative integer, got "${values.limit}"`]);
  }

  const logger = createLogger({
    function_name: 'eps-extract',
    level: config.logging.level,
    sinks: buildSinks(config),
  });

  const images = await listChartImages(config.chartDir);
  logger.info(`Found ${images.length} chart images in ${config.chartDir}`);

  const result = await processCharts({
    images,
    ocr: new VisionOcrClient({ apiKey: config.ocr.apiKey, timeoutMs: config.ocr.timeoutMs }),
    store: buildStore(config),
    logger,
    matching: config.matching,
    limit,
    reprocess: values.reprocess,
  });

  logger.info(`Done: ${result.recordCount} new records, ${result.wide.rows.length} report dates total`);
  if (result.failed.length > 0) process.exitCode = 1;
}

main().catch((error: unknown) => {
  console.error(error instanceof ConfigError ? error.message : error);
  process.exitCode = 1;
});
