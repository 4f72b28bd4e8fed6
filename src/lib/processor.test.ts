import { afterEach, beforeAll, beforeEach, describe, it, expect } from 'vitest';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import sharp from 'sharp';
import type { Fragment } from '@/contracts';
import { listChartImages, processCharts, processImage, type ChartImage } from './processor';
import { createLogger, type LogRow } from './logger';
import type { OcrProvider } from './ocr/visionClient';
import { CONFIDENCE_TABLE_KEY, WIDE_TABLE_KEY, type TableStore } from './storage/tableStore';
import { saveTables } from './storage/tables';
import type { TableData } from './storage/csv';
import { OcrError, TableStoreError } from './errors';

class MemoryTableStore implements TableStore {
  readonly tables = new Map<string, TableData>();
  saves = 0;
  failSaves = false;

  async loadTable(key: string): Promise<TableData | null> {
    return this.tables.get(key) ?? null;
  }

  async saveTable(key: string, table: TableData): Promise<void> {
    if (this.failSaves) throw new TableStoreError(key, 'bucket unavailable');
    this.saves++;
    this.tables.set(key, table);
  }
}

/** Answers detect() calls in order; an Error entry is thrown */
class QueuedOcr implements OcrProvider {
  calls = 0;
  constructor(private readonly answers: Array<Fragment[] | Error>) {}

  async detect(): Promise<Fragment[]> {
    const answer = this.answers[this.calls++] ?? [];
    if (answer instanceof Error) throw answer;
    return answer;
  }
}

function frag(text: string, left: number, top: number): Fragment {
  return { text, left, top, width: 20, height: 10, confidence: 99 };
}

/** One Q1'14 label with its value printed above the bar */
function chart(value: string): Fragment[] {
  return [frag(value, 40, 20), frag("Q1'14", 40, 180)];
}

let blackPng: Uint8Array;

beforeAll(async () => {
  blackPng = await sharp({
    create: { width: 100, height: 200, channels: 3, background: { r: 0, g: 0, b: 0 } },
  }).png().toBuffer();
});

function image(name: string, bytes: () => Uint8Array = () => blackPng): ChartImage {
  return { name, read: async () => bytes() };
}

function silentLogger() {
  const rows: LogRow[] = [];
  return { rows, logger: createLogger({ function_name: 'test', level: 'debug', sinks: [row => { rows.push(row); }] }) };
}

describe('processImage', () => {
  it('turns a chart into extraction records', async () => {
    const { logger } = silentLogger();
    const records = await processImage({ image: image('20161209.png'), ocr: new QueuedOcr([chart('10.0')]), logger });

    expect(records).toEqual([{
      reportDate: '2016-12-09',
      quarter: "Q1'14",
      eps: 10,
      isEstimate: false,
      barColor: 'dark',
      barConfidence: 'high',
    }]);
  });

  it('keeps the raw filename when no date can be read', async () => {
    const { logger } = silentLogger();
    const records = await processImage({ image: image('chart.png'), ocr: new QueuedOcr([chart('1.5')]), logger });
    expect(records.map(r => r.reportDate)).toEqual(['chart.png']);
  });

  it('returns nothing when OCR finds no text or no pairs', async () => {
    const { logger, rows } = silentLogger();
    const ocr = new QueuedOcr([[], [frag('EPS', 10, 10)]]);

    expect(await processImage({ image: image('20161209.png'), ocr, logger })).toEqual([]);
    expect(await processImage({ image: image('20161209.png'), ocr, logger })).toEqual([]);
    expect(rows.filter(r => r.level === 'warn').map(r => r.message)).toEqual([
      'No text detected in 20161209.png',
      'No quarter/number pairs matched in 20161209.png',
    ]);
  });

  it('contains OCR and decode failures', async () => {
    const { logger, rows } = silentLogger();

    const ocrFailure = await processImage({
      image: image('20161209.png'),
      ocr: new QueuedOcr([new OcrError('Vision API returned 500: backend error', { status: 500 })]),
      logger,
    });
    const decodeFailure = await processImage({
      image: image('20161216.png', () => Uint8Array.from([1, 2, 3])),
      ocr: new QueuedOcr([chart('1.0')]),
      logger,
    });

    expect(ocrFailure).toEqual([]);
    expect(decodeFailure).toEqual([]);
    expect(rows.filter(r => r.level === 'error').map(r => r.data)).toMatchObject([
      { error: { name: 'OcrError' } },
      { error: { name: 'ImageDecodeError' } },
    ]);
  });
});

describe('processCharts', () => {
  it('accumulates weekly charts and scores each against the week before', async () => {
    const store = new MemoryTableStore();
    const { logger, rows } = silentLogger();

    const result = await processCharts({
      images: [image('20161209.png'), image('20161216.png'), image('20161223.png')],
      ocr: new QueuedOcr([chart('10.0'), chart('20.0'), chart('21.0')]),
      store,
      logger,
    });

    expect(result.wide.rows.map(r => [r.reportDate, r.cells["Q1'14"]])).toEqual([
      ['2016-12-09', '10.0'],
      ['2016-12-16', '20.0'],
      ['2016-12-23', '21.0'],
    ]);
    expect(result.confidence.map(r => r.confidence)).toEqual([100, 50, 100]);
    expect(result.recordCount).toBe(3);
    expect(result.failed).toEqual([]);

    // both tables rewritten after every image
    expect(store.saves).toBe(6);
    expect(store.tables.get(CONFIDENCE_TABLE_KEY)?.rows).toEqual([
      { Report_Date: '2016-12-09', Confidence: '100.0' },
      { Report_Date: '2016-12-16', Confidence: '50.0' },
      { Report_Date: '2016-12-23', Confidence: '100.0' },
    ]);
    expect(rows.filter(r => r.message.includes('✅')).map(r => r.message)).toEqual([
      '[1/3] ✅ 20161209.png: 1 records',
      '[2/3] ✅ 20161216.png: 1 records',
      '[3/3] ✅ 20161223.png: 1 records',
    ]);
  });

  it('leaves stored tables untouched when a chart yields no text', async () => {
    const store = new MemoryTableStore();
    await saveTables(store, {
      wide: { quarters: ["Q1'14"], rows: [{ reportDate: '2016-12-09', cells: { "Q1'14": '10.0' } }] },
      confidence: [{ reportDate: '2016-12-09', confidence: 100 }],
    });
    const before = store.tables.get(WIDE_TABLE_KEY);
    store.saves = 0;
    const { logger, rows } = silentLogger();

    const result = await processCharts({ images: [image('20161216.png')], ocr: new QueuedOcr([[]]), store, logger });

    expect(store.saves).toBe(0);
    expect(store.tables.get(WIDE_TABLE_KEY)).toBe(before);
    expect(result.wide.rows).toHaveLength(1);
    expect(result.recordCount).toBe(0);
    expect(rows.some(r => r.message === '[1/1] ⚠️ 20161216.png: no data')).toBe(true);
  });

  it('carries on after a failed image', async () => {
    const store = new MemoryTableStore();
    const { logger } = silentLogger();

    const result = await processCharts({
      images: [image('20161209.png'), image('20161216.png'), image('chart.png')],
      ocr: new QueuedOcr([new OcrError('timeout'), chart('2.5'), chart('3.0')]),
      store,
      logger,
    });

    expect(result.failed).toEqual(['20161209.png', 'chart.png']);
    expect(result.processed).toEqual(['20161216.png']);
    expect(result.wide.rows.map(r => r.reportDate)).toEqual(['2016-12-16']);
    expect(result.confidence).toEqual([{ reportDate: '2016-12-16', confidence: 100 }]);
  });

  it('aborts the run when the tables cannot be saved', async () => {
    const store = new MemoryTableStore();
    store.failSaves = true;
    const ocr = new QueuedOcr([chart('1.0'), chart('1.1')]);
    const { logger, rows } = silentLogger();

    await expect(processCharts({
      images: [image('20161209.png'), image('20161216.png')],
      ocr,
      store,
      logger,
    })).rejects.toBeInstanceOf(TableStoreError);

    expect(ocr.calls).toBe(1);
    expect(rows.at(-1)).toMatchObject({ message: 'failed', success: false });
  });

  it('skips report dates already stored unless reprocessing', async () => {
    const store = new MemoryTableStore();
    await saveTables(store, {
      wide: { quarters: ["Q1'14"], rows: [{ reportDate: '2016-12-09', cells: { "Q1'14": '10.0' } }] },
      confidence: [{ reportDate: '2016-12-09', confidence: 100 }],
    });
    const images = [image('20161209.png'), image('20161216.png'), image('20161223.png')];

    const skipping = new QueuedOcr([chart('11.0'), chart('12.0')]);
    const first = await processCharts({ images, ocr: skipping, store, logger: silentLogger().logger, limit: 1 });
    expect(first.processed).toEqual(['20161216.png']);
    expect(first.wide.rows.map(r => r.cells["Q1'14"])).toEqual(['10.0', '11.0']);

    const redo = new QueuedOcr([chart('9.5')]);
    const second = await processCharts({ images, ocr: redo, store, logger: silentLogger().logger, reprocess: true, limit: 1 });
    expect(second.processed).toEqual(['20161209.png']);
    expect(second.wide.rows.map(r => r.cells["Q1'14"])).toEqual(['9.5', '11.0']);
  });
});

describe('listChartImages', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'eps-charts-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('lists PNG files in filename order', async () => {
    await fs.writeFile(path.join(dir, '20161216.png'), Uint8Array.from([2]));
    await fs.writeFile(path.join(dir, '20161209.PNG'), Uint8Array.from([1]));
    await fs.writeFile(path.join(dir, 'notes.txt'), 'x');
    await fs.mkdir(path.join(dir, 'archive.png'));

    const images = await listChartImages(dir);

    expect(images.map(i => i.name)).toEqual(['20161209.PNG', '20161216.png']);
    expect([...(await images[1].read())]).toEqual([2]);
  });
});
