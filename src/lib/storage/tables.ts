import type { MergedTables } from '../extraction/timeSeries';
import { emptyWideTable } from '../extraction/wideTable';
import { confidenceFromData, confidenceToData, wideTableFromData, wideTableToData } from './tableCodec';
import { CONFIDENCE_TABLE_KEY, WIDE_TABLE_KEY, type TableStore } from './tableStore';

/**
 * Load both accumulated tables; a table that was never written starts empty
 */
export async function loadTables(store: TableStore): Promise<MergedTables> {
  const [wideData, confidenceData] = await Promise.all([
    store.loadTable(WIDE_TABLE_KEY),
    store.loadTable(CONFIDENCE_TABLE_KEY),
  ]);

  return {
    wide: wideData ? wideTableFromData(WIDE_TABLE_KEY, wideData) : emptyWideTable(),
    confidence: confidenceData ? confidenceFromData(CONFIDENCE_TABLE_KEY, confidenceData) : [],
  };
}

/** Wide table first, then confidence */
export async function saveTables(store: TableStore, tables: MergedTables): Promise<void> {
  await store.saveTable(WIDE_TABLE_KEY, wideTableToData(tables.wide));
  await store.saveTable(CONFIDENCE_TABLE_KEY, confidenceToData(tables.confidence));
}
