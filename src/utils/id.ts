import { createHash } from 'node:crypto';

export function jobName(prefix: string, ordinal: number): string {
  return `${prefix}_${String(ordinal).padStart(3, '0')}`;
}

/** Short stable hash of an index set, independent of input order and duplicates. */
export function indexSetDigest(indices: Iterable<number>): string {
  const sorted = [...new Set(indices)].sort((a, b) => a - b);
  return createHash('sha256').update(sorted.join(',')).digest('hex').slice(0, 6);
}

export function customId(index: number): string {
  return `row_${index}`;
}

const CUSTOM_ID = /^row_(\d+)$/;

export function parseCustomId(id: string): number | null {
  const match = CUSTOM_ID.exec(id);
  if (!match) return null;
  const index = parseInt(match[1], 10);
  return Number.isSafeInteger(index) ? index : null;
}
