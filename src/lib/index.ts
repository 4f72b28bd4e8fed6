// ============================================================
// EPS CHART EXTRACTOR - PUBLIC API
// ============================================================

export * from './extraction';

export {
  processImage,
  processCharts,
  extractImage,
  listChartImages,
  type ChartImage,
  type ImageOutcome,
  type ProcessChartsResult,
} from './processor';

export { VisionOcrClient, type OcrProvider } from './ocr/visionClient';

export {
  FileTableStore,
  SupabaseTableStore,
  WIDE_TABLE_KEY,
  CONFIDENCE_TABLE_KEY,
  type TableStore,
} from './storage/tableStore';
export { loadTables, saveTables } from './storage/tables';
export type { TableData } from './storage/csv';

export { decodeGrayscale } from './image';
export { loadConfig, type AppConfig } from './config';
export { createLogger, consoleSink, supabaseSink, type Logger, type LogSink } from './logger';
export { OcrError, ImageDecodeError, TableStoreError, ConfigError } from './errors';
