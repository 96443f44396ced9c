import { join } from 'node:path';
import { readTextIfExists, writeJsonAtomic } from '../utils/fs.js';
import { ledgerFileSchema } from './types.js';
import type { JobRecord, LedgerFile } from './types.js';
import type { Job, RunInfo } from '../control-plane/types.js';

export const LEDGER_FILENAME = 'batch_status.json';

export function toJobRecord(job: Job): JobRecord {
  const record: JobRecord = {
    name: job.name,
    start_index: job.startIndex,
    end_index: job.endIndex,
    status: job.status,
    attempts: job.attempts,
    max_attempts: job.maxAttempts,
    error_message: job.errorMessage,
    provider_batch_id: job.providerBatchId,
    result_files: [...job.resultFiles],
    error_files: [...job.errorFiles],
    created_at: job.createdAt,
    completed_at: job.completedAt,
  };
  if (job.indices) record.indices = [...job.indices];
  if (job.failureCategory) record.failure_category = job.failureCategory;
  if (job.submittedRows !== undefined) record.submitted_rows = job.submittedRows;
  if (job.skippedRows !== undefined) record.skipped_rows = job.skippedRows;
  return record;
}

export function fromJobRecord(record: JobRecord): Job {
  return {
    name: record.name,
    startIndex: record.start_index,
    endIndex: record.end_index,
    indices: record.indices,
    status: record.status,
    attempts: record.attempts,
    maxAttempts: record.max_attempts,
    errorMessage: record.error_message,
    failureCategory: record.failure_category,
    providerBatchId: record.provider_batch_id,
    resultFiles: record.result_files,
    errorFiles: record.error_files,
    submittedRows: record.submitted_rows,
    skippedRows: record.skipped_rows,
    createdAt: record.created_at,
    completedAt: record.completed_at,
  };
}

export function newJob(
  name: string,
  startIndex: number,
  endIndex: number,
  maxAttempts: number,
  indices?: number[],
  now: Date = new Date()
): Job {
  if (startIndex >= endIndex) {
    throw new Error(`Job "${name}" has an empty range [${startIndex}, ${endIndex})`);
  }
  return {
    name,
    startIndex,
    endIndex,
    indices,
    status: 'pending',
    attempts: 0,
    maxAttempts,
    errorMessage: '',
    providerBatchId: '',
    resultFiles: [],
    errorFiles: [],
    createdAt: now.toISOString(),
    completedAt: null,
  };
}

/**
 * The persisted job list of one run. The same instance is read and written by
 * the orchestrator; every save rewrites the whole file atomically.
 */
export class JobLedger {
  readonly path: string;
  readonly jobs: Job[];
  run?: RunInfo;
  lastUpdated: string;
  private lastWrite: Promise<void> = Promise.resolve();

  private constructor(path: string, jobs: Job[], lastUpdated: string, run?: RunInfo) {
    this.path = path;
    this.jobs = jobs;
    this.lastUpdated = lastUpdated;
    this.run = run;
  }

  static async open(runDir: string): Promise<JobLedger> {
    const path = join(runDir, LEDGER_FILENAME);
    const raw = await readTextIfExists(path);
    if (raw === null) {
      return new JobLedger(path, [], new Date().toISOString());
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      throw new Error(
        `Ledger ${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`
      );
    }

    const parsed = ledgerFileSchema.safeParse(data);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('; ');
      throw new Error(`Ledger ${path} failed validation: ${issues}`);
    }

    const file = parsed.data;
    const names = new Set<string>();
    for (const job of file.jobs) {
      if (names.has(job.name)) {
        throw new Error(`Ledger ${path} contains job "${job.name}" twice`);
      }
      names.add(job.name);
    }

    const run = file.run
      ? {
          recordsPath: file.run.records_path,
          model: file.run.model,
          batchSize: file.run.batch_size,
        }
      : undefined;

    return new JobLedger(path, file.jobs.map(fromJobRecord), file.last_updated, run);
  }

  static async exists(runDir: string): Promise<boolean> {
    return (await readTextIfExists(join(runDir, LEDGER_FILENAME))) !== null;
  }

  find(name: string): Job | undefined {
    return this.jobs.find((job) => job.name === name);
  }

  /** Returns false when a job with the same name is already present. */
  add(job: Job): boolean {
    if (this.find(job.name)) return false;
    this.jobs.push(job);
    return true;
  }

  toFile(): LedgerFile {
    const file: LedgerFile = {
      last_updated: this.lastUpdated,
      total_jobs: this.jobs.length,
      jobs: this.jobs.map(toJobRecord),
    };
    if (this.run) {
      file.run = {
        records_path: this.run.recordsPath,
        model: this.run.model,
        batch_size: this.run.batchSize,
      };
    }
    return file;
  }

  /**
   * Writes run one at a time in call order, each serialising the ledger as it
   * is when its turn comes. Write failures propagate to the caller of that save.
   */
  async save(now: Date = new Date()): Promise<void> {
    this.lastUpdated = now.toISOString();
    const write = this.lastWrite.then(() => writeJsonAtomic(this.path, this.toFile()));
    this.lastWrite = write.catch(() => undefined);
    await write;
  }
}
