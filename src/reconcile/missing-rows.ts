import { readFile, rm } from 'node:fs/promises';
import { writeFileAtomic } from '../utils/fs.js';

export function missingRowsPath(outputPath: string): string {
  const base = outputPath.toLowerCase().endsWith('.csv') ? outputPath.slice(0, -4) : outputPath;
  return `${base}_missing_rows.txt`;
}

/** Writes 1-based row numbers, one per line. */
export async function writeMissingRows(path: string, rows: number[]): Promise<void> {
  await writeFileAtomic(path, rows.map((r) => `${r}\n`).join(''));
}

export async function clearMissingRows(path: string): Promise<void> {
  await rm(path, { force: true });
}

/** Parses a missing-rows file into sorted, de-duplicated 0-based indices. */
export function parseMissingRows(content: string): number[] {
  const indices = new Set<number>();
  for (const raw of content.split(/\r?\n/)) {
    const line = raw.trim();
    if (!/^\d+$/.test(line)) continue;
    const row = parseInt(line, 10);
    if (row >= 1) indices.add(row - 1);
  }
  return [...indices].sort((a, b) => a - b);
}

export async function readMissingRows(path: string): Promise<number[]> {
  return parseMissingRows(await readFile(path, 'utf-8'));
}
