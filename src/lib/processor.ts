// ============================================================
// EPS CHART PIPELINE
// OCR → match → classify per image; merge and persist after each image
// ============================================================

import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { ExtractionRecord, GrayImage, MatchOptions } from './extraction/types';
import { DEFAULT_MATCH_OPTIONS } from './extraction/types';
import { matchQuartersWithNumbers } from './extraction/matching';
import { classifyAllBars } from './extraction/barClassifier';
import { isIsoReportDate, reportDateKey, resolveReportDate } from './extraction/reportDate';
import { mergeExtractionResults, type MergedTables } from './extraction/timeSeries';
import type { OcrProvider } from './ocr/visionClient';
import type { TableStore } from './storage/tableStore';
import { loadTables, saveTables } from './storage/tables';
import { decodeGrayscale } from './image';
import type { Logger } from './logger';

/** One report image; bytes are read lazily */
export interface ChartImage {
  name: string;
  read(): Promise<Uint8Array>;
}

export type ImageOutcome =
  | { status: 'ok'; records: ExtractionRecord[] }
  | { status: 'empty'; reason: 'no_text' | 'no_matches' }
  | { status: 'failed'; error: unknown };

export interface ProcessImageParams {
  image: ChartImage;
  ocr: OcrProvider;
  logger: Logger;
  matching?: Partial<MatchOptions>;
  decode?: (bytes: Uint8Array) => Promise<GrayImage>;
}

/**
 * Run one image through the pipeline and report how it went.
 * Never throws: any failure becomes a `failed` outcome.
 */
export async function extractImage(params: ProcessImageParams): Promise<ImageOutcome> {
  const { image, ocr, logger, decode = decodeGrayscale } = params;
  const matching = { ...DEFAULT_MATCH_OPTIONS, ...params.matching };

  try {
    const bytes = await image.read();

    const fragments = await ocr.detect(bytes);
    if (fragments.length === 0) {
      logger.warn(`No text detected in ${image.name}`);
      return { status: 'empty', reason: 'no_text' };
    }
    logger.debug(`OCR returned ${fragments.length} fragments`, { image: image.name });

    const pairs = matchQuartersWithNumbers(fragments, matching);
    if (pairs.length === 0) {
      logger.warn(`No quarter/number pairs matched in ${image.name}`, { fragments: fragments.length });
      return { status: 'empty', reason: 'no_matches' };
    }

    const gray = await decode(bytes);
    const classified = classifyAllBars(gray, pairs);
    const reportDate = reportDateKey(resolveReportDate(image.name));

    const records = classified.map((pair): ExtractionRecord => ({
      reportDate,
      quarter: pair.quarter.toString(),
      eps: pair.eps,
      isEstimate: pair.barColor === 'light',
      barColor: pair.barColor,
      barConfidence: pair.barConfidence,
    }));

    logger.debug(`Extracted ${records.length} records`, {
      image: image.name,
      bars: classified.map(p => ({ quarter: p.quarter.toString(), votes: p.barVotes, methods: p.barMethods })),
    });
    return { status: 'ok', records };
  } catch (error) {
    logger.error(`Failed to process ${image.name}`, error);
    return { status: 'failed', error };
  }
}

/**
 * Extraction records for one report image; empty when nothing could be read
 */
export async function processImage(params: ProcessImageParams): Promise<ExtractionRecord[]> {
  const outcome = await extractImage(params);
  return outcome.status === 'ok' ? outcome.records : [];
}

export interface ProcessChartsParams {
  images: ChartImage[];
  ocr: OcrProvider;
  store: TableStore;
  logger: Logger;
  matching?: Partial<MatchOptions>;
  /** Process at most this many images after skipping */
  limit?: number;
  /** Re-run images whose report date is already in the wide table */
  reprocess?: boolean;
  decode?: (bytes: Uint8Array) => Promise<GrayImage>;
}

export interface ProcessChartsResult extends MergedTables {
  processed: string[];
  failed: string[];
  recordCount: number;
}

function selectImages(images: ChartImage[], tables: MergedTables, reprocess: boolean, limit: number | undefined): ChartImage[] {
  const known = new Set(tables.wide.rows.map(row => row.reportDate));
  const pending = reprocess
    ? images
    : images.filter(image => {
        const date = resolveReportDate(image.name);
        return date.kind !== 'date' || !known.has(date.value);
      });
  return limit === undefined ? pending : pending.slice(0, Math.max(0, limit));
}

/**
 * Process report images in order, persisting both tables after every image
 * that yields records. Per-image failures are logged and skipped; storage
 * failures abort the run.
 */
export async function processCharts(params: ProcessChartsParams): Promise<ProcessChartsResult> {
  const { ocr, store, matching, decode, reprocess = false } = params;
  const logger = params.logger.child('process-charts');
  const runId = logger.startTimer({ images: params.images.length, reprocess });

  try {
    let tables = await loadTables(store);
    logger.info(`Loaded ${tables.wide.rows.length} existing report dates`);

    const images = selectImages(params.images, tables, reprocess, params.limit);
    const skipped = params.images.length - images.length;
    if (skipped > 0) logger.info(`Skipping ${skipped} images`, { reprocess, limit: params.limit ?? null });

    const processed: string[] = [];
    const failed: string[] = [];
    let recordCount = 0;

    for (const [index, image] of images.entries()) {
      const progress = `[${index + 1}/${images.length}]`;
      const outcome = await extractImage({ image, ocr, logger: logger.child('process-image'), matching, decode });

      if (outcome.status === 'failed') {
        failed.push(image.name);
        logger.error(`${progress} ❌ ${image.name}`, outcome.error);
        continue;
      }
      if (outcome.status === 'empty') {
        processed.push(image.name);
        logger.warn(`${progress} ⚠️ ${image.name}: no data`, { reason: outcome.reason });
        continue;
      }

      const badDates = [...new Set(outcome.records.map(r => r.reportDate))].filter(d => !isIsoReportDate(d));
      if (badDates.length > 0) {
        failed.push(image.name);
        logger.error(`${progress} ❌ ${image.name}: no report date in filename`, undefined, { reportDate: badDates });
        continue;
      }

      tables = mergeExtractionResults({
        existingWide: tables.wide,
        existingConfidence: tables.confidence,
        records: outcome.records,
      });
      await saveTables(store, tables);

      processed.push(image.name);
      recordCount += outcome.records.length;
      logger.info(`${progress} ✅ ${image.name}: ${outcome.records.length} records`);
    }

    logger.info('Run summary', {
      reportDates: tables.wide.rows.length,
      quarters: tables.wide.quarters.length,
      newRecords: recordCount,
      processed: processed.length,
      failed,
    });
    logger.endTimer(runId, true);

    return { ...tables, processed, failed, recordCount };
  } catch (error) {
    logger.endTimer(runId, false, error);
    throw error;
  }
}

/**
 * PNG report images in a directory, in lexical (and so chronological) filename order
 */
export async function listChartImages(directory: string): Promise<ChartImage[]> {
  const entries = await fs.readdir(directory, { withFileTypes: true });
  return entries
    .filter(entry => entry.isFile() && entry.name.toLowerCase().endsWith('.png'))
    .map(entry => entry.name)
    .sort()
    .map(name => ({
      name,
      read: async () => {
        const buffer = await fs.readFile(path.join(directory, name));
        return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
      },
    }));
}
