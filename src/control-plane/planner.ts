import { newJob } from '../ledger/ledger.js';
import type { JobLedger } from '../ledger/ledger.js';
import { indexSetDigest, jobName } from '../utils/id.js';
import type { Job } from './types.js';

export interface PlanOptions {
  batchSize: number;
  maxAttempts: number;
  now?: Date;
}

export interface IndexSetPlanOptions extends PlanOptions {
  /** Largest allowed distance between neighbouring indices in one job. */
  maxGap?: number;
}

export interface PlanResult {
  created: Job[];
  existing: Job[];
}

function checkBatchSize(batchSize: number): void {
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new Error(`Batch size must be a positive integer (got ${batchSize})`);
  }
}

/** A plain range job over exactly [start, end), whatever its name. */
function findRangeJob(ledger: JobLedger, start: number, end: number): Job | undefined {
  return ledger.jobs.find((job) => job.indices === undefined && job.startIndex === start && job.endIndex === end);
}

/**
 * Splits [start, end) into jobs of at most batchSize rows. Names follow the
 * row position (rows 0-19 of a 20-row batch size are batch_001), so planning
 * the same range twice adds nothing. A chunk whose name is already taken by a
 * different range gets a name carrying its 1-based rows instead.
 */
export async function planRange(
  ledger: JobLedger,
  start: number,
  end: number,
  opts: PlanOptions
): Promise<PlanResult> {
  checkBatchSize(opts.batchSize);
  if (start < 0 || end < start) {
    throw new Error(`Invalid row range [${start}, ${end})`);
  }

  const result: PlanResult = { created: [], existing: [] };

  for (let current = start; current < end; current += opts.batchSize) {
    const chunkEnd = Math.min(current + opts.batchSize, end);
    const existing = findRangeJob(ledger, current, chunkEnd);
    if (existing) {
      result.existing.push(existing);
      continue;
    }

    let name = jobName('batch', Math.floor(current / opts.batchSize) + 1);
    const taken = ledger.find(name);
    if (taken) {
      const qualified = `batch_${current + 1}_${chunkEnd}`;
      console.warn(
        `  [warn] ${name} already covers rows ${taken.startIndex + 1}-${taken.endIndex}; ` +
        `planning rows ${current + 1}-${chunkEnd} as ${qualified}`
      );
      name = qualified;
    }

    const job = newJob(name, current, chunkEnd, opts.maxAttempts, undefined, opts.now);
    ledger.add(job);
    result.created.push(job);
  }

  await ledger.save(opts.now);
  return result;
}

/** Groups sorted indices into runs no longer than batchSize with gaps of at most maxGap. */
export function groupIndices(indices: number[], batchSize: number, maxGap: number): number[][] {
  const sorted = [...new Set(indices)].sort((a, b) => a - b);
  const groups: number[][] = [];
  let current: number[] = [];

  for (const index of sorted) {
    const last = current[current.length - 1];
    if (current.length > 0 && (current.length >= batchSize || index - last > maxGap)) {
      groups.push(current);
      current = [];
    }
    current.push(index);
  }
  if (current.length > 0) groups.push(current);

  return groups;
}

/**
 * Plans jobs over an arbitrary index set, typically the rows still missing
 * after a merge. Job names carry a digest of the whole set, so planning the
 * same set again is a no-op.
 */
export async function planIndexSet(
  ledger: JobLedger,
  indices: number[],
  opts: IndexSetPlanOptions
): Promise<PlanResult> {
  checkBatchSize(opts.batchSize);
  if (indices.some((i) => !Number.isInteger(i) || i < 0)) {
    throw new Error('Row indices must be non-negative integers');
  }

  const result: PlanResult = { created: [], existing: [] };
  if (indices.length === 0) return result;

  const prefix = `retry_${indexSetDigest(indices)}`;
  const groups = groupIndices(indices, opts.batchSize, opts.maxGap ?? 5);

  groups.forEach((group, i) => {
    const name = jobName(prefix, i + 1);
    const existing = ledger.find(name);
    if (existing) {
      result.existing.push(existing);
      return;
    }

    const first = group[0];
    const last = group[group.length - 1];
    const contiguous = last - first + 1 === group.length;
    const job = newJob(name, first, last + 1, opts.maxAttempts, contiguous ? undefined : group, opts.now);
    ledger.add(job);
    result.created.push(job);
  });

  await ledger.save(opts.now);
  return result;
}
