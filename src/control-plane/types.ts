export type JobStatus = 'pending' | 'running' | 'completed' | 'failed' | 'timed_out';

export type FailureCategory =
  | 'quota'
  | 'rate_limit'
  | 'credential'
  | 'timeout'
  | 'input_validation'
  | 'unknown';

export type VerifyMode = 'overlap' | 'exact';

export interface Job {
  name: string;
  startIndex: number;
  /** Exclusive. */
  endIndex: number;
  /** Explicit index set for non-contiguous jobs; absent means [startIndex, endIndex). */
  indices?: number[];
  status: JobStatus;
  attempts: number;
  maxAttempts: number;
  errorMessage: string;
  failureCategory?: FailureCategory;
  providerBatchId: string;
  resultFiles: string[];
  errorFiles: string[];
  submittedRows?: number;
  skippedRows?: number;
  createdAt: string;
  completedAt: string | null;
}

export type JobEvent =
  | { type: 'start' }
  | { type: 'complete' }
  | { type: 'fail'; reason: string; category: FailureCategory }
  | { type: 'time_out'; reason: string }
  | { type: 'interrupt' }
  | { type: 'reset' };

export interface RunInfo {
  recordsPath: string;
  model: string;
  batchSize: number;
}

export interface RunOptions {
  runDir: string;
  model: string;
  jobTimeoutMs: number;
  verify: VerifyMode;
}

export interface JobSummary {
  total: number;
  byStatus: Record<JobStatus, number>;
  completionRate: number;
  unfinished: Array<{
    name: string;
    status: JobStatus;
    attempts: number;
    maxAttempts: number;
    reason: string;
    category?: FailureCategory;
    rows: string;
  }>;
}
