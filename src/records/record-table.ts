import { readFile } from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { writeFileAtomic } from '../utils/fs.js';

export interface RecordRow {
  /** 0-based position in the table, excluding the header. */
  index: number;
  values: Record<string, string>;
}

export interface RecordTable {
  columns: string[];
  rows: RecordRow[];
}

function isStringRow(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((cell) => typeof cell === 'string');
}

export function parseRecordTable(content: string): RecordTable {
  const parsed: unknown = parse(content, {
    bom: true,
    columns: false,
    skip_empty_lines: true,
    relax_column_count: true,
  });

  if (!Array.isArray(parsed) || parsed.length === 0) {
    return { columns: [], rows: [] };
  }

  const [header, ...body] = parsed;
  if (!isStringRow(header)) {
    throw new Error('Record table header is not a row of strings');
  }
  const columns = header.map((c) => c.trim());

  const rows = body.map((cells, index): RecordRow => {
    const values: Record<string, string> = {};
    const row = isStringRow(cells) ? cells : [];
    columns.forEach((column, i) => {
      values[column] = row[i] ?? '';
    });
    return { index, values };
  });

  return { columns, rows };
}

export async function readRecordTable(path: string): Promise<RecordTable> {
  const content = await readFile(path, 'utf-8');
  return parseRecordTable(content);
}

export function requireColumns(table: RecordTable, required: string[]): void {
  const missing = required.filter((c) => !table.columns.includes(c));
  if (missing.length > 0) {
    throw new Error(
      `Record table is missing column(s): ${missing.join(', ')} ` +
      `(found: ${table.columns.join(', ') || 'none'})`
    );
  }
}

export function stringifyTable(columns: string[], rows: Array<Record<string, string>>): string {
  const body = rows.map((row) => columns.map((c) => row[c] ?? ''));
  return stringify([columns, ...body]);
}

export async function writeTable(
  path: string,
  columns: string[],
  rows: Array<Record<string, string>>
): Promise<void> {
  await writeFileAtomic(path, stringifyTable(columns, rows));
}
