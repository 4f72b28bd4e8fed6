import Papa from 'papaparse';

/** Column-ordered string table as it is persisted */
export interface TableData {
  columns: string[];
  rows: Record<string, string>[];
}

/** Parse CSV text; every cell stays a string so "28.0" and "27.85*" survive unchanged */
export function parseCsv(text: string): TableData {
  const parsed = Papa.parse<Record<string, string>>(text, {
    header: true,
    dynamicTyping: false,
    skipEmptyLines: true,
  });
  const rows = parsed.data.filter(Boolean);
  const columns = parsed.meta.fields ?? Object.keys(rows[0] ?? {});
  return { columns, rows };
}

export function toCsv(table: TableData): string {
  return Papa.unparse(
    {
      fields: table.columns,
      data: table.rows.map(row => table.columns.map(column => row[column] ?? '')),
    },
    { newline: '\n' },
  );
}
