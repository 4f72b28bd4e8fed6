// ============================================================
// DURABLE TABLE STORAGE
// Whole-table read and whole-table rewrite; single writer assumed
// ============================================================

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { TableStoreError } from '../errors';
import { parseCsv, toCsv, type TableData } from './csv';

export const WIDE_TABLE_KEY = 'extracted_estimates.csv';
export const CONFIDENCE_TABLE_KEY = 'extracted_estimates_confidence.csv';

export interface TableStore {
  /** null when the table has never been written */
  loadTable(key: string): Promise<TableData | null>;
  saveTable(key: string, table: TableData): Promise<void>;
}

/** The slice of a Supabase client's storage API the store needs */
export interface StorageBucketClient {
  storage: {
    from(bucket: string): {
      download(path: string): PromiseLike<{ data: Blob | null; error: { message: string } | null }>;
      upload(
        path: string,
        body: string,
        options: { contentType: string; upsert: boolean },
      ): PromiseLike<{ error: { message: string } | null }>;
    };
  };
}

function statusOf(error: object): string {
  if ('statusCode' in error && error.statusCode !== undefined) return String(error.statusCode);
  if ('status' in error && error.status !== undefined) return String(error.status);
  return '';
}

function isNotFound(error: object): boolean {
  const original = 'originalError' in error && error.originalError && typeof error.originalError === 'object'
    ? error.originalError
    : null;
  const message = 'message' in error && typeof error.message === 'string' ? error.message : '';
  return statusOf(error) === '404'
    || (original !== null && statusOf(original) === '404')
    || /not.?found/i.test(message);
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * CSV objects in a Supabase Storage bucket
 */
export class SupabaseTableStore implements TableStore {
  constructor(
    private readonly client: StorageBucketClient,
    private readonly bucket: string,
  ) {}

  async loadTable(key: string): Promise<TableData | null> {
    const { data: blob, error } = await this.client.storage.from(this.bucket).download(key);

    if (error) {
      if (isNotFound(error)) return null;
      throw new TableStoreError(key, `download failed: ${error.message}`, { cause: error });
    }
    if (!blob) return null;

    return parseCsv(await blob.text());
  }

  async saveTable(key: string, table: TableData): Promise<void> {
    const { error } = await this.client.storage.from(this.bucket).upload(key, toCsv(table), {
      contentType: 'text/csv',
      upsert: true,
    });

    if (error) {
      throw new TableStoreError(key, `upload failed: ${error.message}`, { cause: error });
    }
  }
}

/**
 * CSV files in a local directory.
 * Saves go through a temp file and a rename so a failed write keeps the prior table.
 */
export class FileTableStore implements TableStore {
  constructor(private readonly directory: string) {}

  private pathFor(key: string): string {
    return path.join(this.directory, key);
  }

  async loadTable(key: string): Promise<TableData | null> {
    let text: string;
    try {
      text = await fs.readFile(this.pathFor(key), 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return null;
      throw new TableStoreError(key, `read failed: ${messageOf(error)}`, { cause: error });
    }
    return parseCsv(text);
  }

  async saveTable(key: string, table: TableData): Promise<void> {
    const target = this.pathFor(key);
    const temp = `${target}.${process.pid}.tmp`;
    try {
      await fs.mkdir(this.directory, { recursive: true });
      await fs.writeFile(temp, toCsv(table), 'utf8');
      await fs.rename(temp, target);
    } catch (error) {
      await fs.rm(temp, { force: true });
      throw new TableStoreError(key, `write failed: ${messageOf(error)}`, { cause: error });
    }
  }
}
