import { Stopwatch, formatDuration } from '../utils/timer.js';
import { deadline, raceAbort } from '../utils/abort.js';
import { writeFileAtomic } from '../utils/fs.js';
import { runPaths } from '../ledger/run-paths.js';
import { estimateCost, formatUsd } from '../ledger/cost-ledger.js';
import { outcomeIndices } from '../reconcile/result-parser.js';
import { toJsonl } from '../records/request-encoder.js';
import { classifyFailure, describeCategory } from './failure-classifier.js';
import { realSleep } from './retry-policy.js';
import {
  describeRows,
  isExhausted,
  isRetryable,
  isRunnable,
  jobIndices,
  transition,
} from './job-state.js';
import type { JobLedger } from '../ledger/ledger.js';
import type { RunPaths } from '../ledger/run-paths.js';
import type { CostLedger } from '../ledger/cost-ledger.js';
import type { BatchGateway, GatewayResult } from '../gateway/types.js';
import type { BatchRequestLine, RequestEncoder } from '../records/request-encoder.js';
import type { PassKind, RetryPolicy, Sleep } from './retry-policy.js';
import type {
  FailureCategory,
  Job,
  JobEvent,
  JobStatus,
  JobSummary,
  RunOptions,
  VerifyMode,
} from './types.js';

export interface OrchestratorDeps {
  ledger: JobLedger;
  encoder: RequestEncoder;
  gateway: BatchGateway;
  costs: CostLedger;
  policy: RetryPolicy;
  options: RunOptions;
  sleep?: Sleep;
  clock?: () => Date;
}

type Verification = { ok: true; covered: number } | { ok: false; reason: string };

/**
 * Checks that a downloaded result file belongs to the job before the job is
 * marked completed. The gateway's own success report is not enough.
 */
export function verifyResults(
  job: Job,
  submitted: ReadonlySet<number>,
  outputText: string,
  errorText: string | undefined,
  mode: VerifyMode
): Verification {
  const jobSet = new Set(jobIndices(job));
  const { indices, foreign } = outcomeIndices(outputText);

  const outside = indices.filter((i) => !jobSet.has(i));
  if (foreign.length > 0 || outside.length > 0) {
    return {
      ok: false,
      reason: `result file holds ${foreign.length + outside.length} row(s) that do not belong to ${job.name}`,
    };
  }

  const covered = new Set(indices.filter((i) => submitted.has(i)));
  if (covered.size === 0) {
    return { ok: false, reason: `result file has no rows from ${job.name}` };
  }

  if (mode === 'exact') {
    const errored = new Set(errorText ? outcomeIndices(errorText).indices : []);
    const unaccounted = [...submitted].filter((i) => !covered.has(i) && !errored.has(i));
    if (unaccounted.length > 0) {
      return {
        ok: false,
        reason: `result file is missing ${unaccounted.length} of ${submitted.size} submitted rows`,
      };
    }
  }

  return { ok: true, covered: covered.size };
}

export class JobOrchestrator {
  readonly ledger: JobLedger;
  private readonly deps: OrchestratorDeps;
  private readonly paths: RunPaths;
  private readonly sleep: Sleep;
  private readonly clock: () => Date;

  constructor(deps: OrchestratorDeps) {
    this.deps = deps;
    this.ledger = deps.ledger;
    this.paths = runPaths(deps.options.runDir);
    this.sleep = deps.sleep ?? realSleep;
    this.clock = deps.clock ?? (() => new Date());
  }

  private async apply(job: Job, event: JobEvent): Promise<void> {
    transition(job, event, this.clock());
    await this.ledger.save(this.clock());
  }

  /** Jobs left running by a process that died are failed attempts. */
  async recoverInterrupted(): Promise<Job[]> {
    const interrupted = this.ledger.jobs.filter((job) => job.status === 'running');
    for (const job of interrupted) {
      transition(job, { type: 'interrupt' }, this.clock());
      console.warn(`  [warn] ${job.name} was interrupted during attempt ${job.attempts}`);
    }
    if (interrupted.length > 0) await this.ledger.save(this.clock());
    return interrupted;
  }

  async runJob(job: Job): Promise<boolean> {
    if (!isRunnable(job)) {
      throw new Error(
        `Job "${job.name}" is not runnable (status ${job.status}, attempt ${job.attempts}/${job.maxAttempts})`
      );
    }

    await this.apply(job, { type: 'start' });
    const timer = new Stopwatch();
    console.log(`  [run]  ${job.name} attempt ${job.attempts}/${job.maxAttempts} (${describeRows(job)})`);

    const requests: Array<{ index: number; request: BatchRequestLine }> = [];
    let skipped = 0;
    for (const index of jobIndices(job)) {
      const encoded = await this.deps.encoder.encode(index);
      if (encoded.kind === 'request') {
        requests.push({ index: encoded.index, request: encoded.request });
      } else {
        skipped++;
        console.warn(`  [skip] row ${index + 1}: ${encoded.reason}`);
      }
    }
    job.submittedRows = requests.length;
    job.skippedRows = skipped;

    if (requests.length === 0) {
      return this.failJob(job, 'no valid requests', 'input_validation');
    }

    const jsonl = toJsonl(requests.map((r) => r.request));
    await writeFileAtomic(this.paths.resolve(this.paths.inputFile(job.name)), jsonl);

    const result = await this.submit(job, jsonl);
    if (result === 'timeout') {
      return this.timeOutJob(job, `no result within ${formatDuration(this.deps.options.jobTimeoutMs)}`);
    }

    if (!result.ok) {
      if (result.batchId) job.providerBatchId = result.batchId;
      const reason = `${result.stage} failed: ${result.message}`;
      if (result.timedOut) return this.timeOutJob(job, reason);
      return this.failJob(job, reason, classifyFailure(result));
    }

    job.providerBatchId = result.batchId;

    if (result.errorText) {
      const errorRel = this.paths.errorFile(job.name, job.attempts);
      await writeFileAtomic(this.paths.resolve(errorRel), result.errorText);
      job.errorFiles.push(errorRel);
    }

    if (!result.outputText) {
      return this.failJob(
        job,
        `provider reported success but returned no result file (${result.counts.failed} of ${result.counts.total} requests failed)`,
        'unknown'
      );
    }

    const resultRel = this.paths.resultFile(job.name, job.attempts);
    await writeFileAtomic(this.paths.resolve(resultRel), result.outputText);
    job.resultFiles.push(resultRel);

    const submitted = new Set(requests.map((r) => r.index));
    const verdict = verifyResults(job, submitted, result.outputText, result.errorText, this.deps.options.verify);
    if (!verdict.ok) {
      return this.failJob(job, `unverified result: ${verdict.reason}`, 'unknown');
    }

    await this.apply(job, { type: 'complete' });

    const estimate = estimateCost(submitted.size, this.deps.options.model);
    await this.deps.costs.record(job.name, job.providerBatchId, estimate, result.counts.completed, this.clock());

    console.log(
      `  [done] ${job.name} ${verdict.covered}/${submitted.size} rows returned ` +
      `in ${formatDuration(timer.elapsedMs())} (est. ${formatUsd(estimate.batchCost)})`
    );
    return true;
  }

  private async submit(job: Job, jsonl: string): Promise<GatewayResult | 'timeout'> {
    const limit = deadline(this.deps.options.jobTimeoutMs);
    try {
      const call = this.deps.gateway.runBatch(jsonl, {
        label: `${job.name}_a${job.attempts}`,
        signal: limit.signal,
        onSubmitted: async (batchId) => {
          job.providerBatchId = batchId;
          await this.ledger.save(this.clock());
        },
      });
      return await raceAbort(call, limit.signal);
    } catch (err) {
      if (limit.signal.aborted) return 'timeout';
      throw err;
    } finally {
      limit.clear();
    }
  }

  private async failJob(job: Job, reason: string, category: FailureCategory): Promise<boolean> {
    await this.apply(job, { type: 'fail', reason, category });
    console.error(`  [FAIL] ${job.name}: ${reason} [${describeCategory(category)}]`);
    return false;
  }

  private async timeOutJob(job: Job, reason: string): Promise<boolean> {
    await this.apply(job, { type: 'time_out', reason });
    console.error(`  [FAIL] ${job.name}: ${reason} [${describeCategory('timeout')}]`);
    return false;
  }

  private async runSequence(jobs: Job[], pass: PassKind): Promise<void> {
    let wait: number | null = null;
    for (const job of jobs) {
      if (wait !== null && wait > 0) {
        console.log(`  [wait] ${formatDuration(wait)}`);
        await this.sleep(wait);
      }
      const ok = await this.runJob(job);
      wait = this.deps.policy.delayAfter(ok, pass);
    }
  }

  /** One pass over the ledger in order, skipping completed and exhausted jobs. */
  async runAll(): Promise<JobSummary> {
    await this.recoverInterrupted();

    const runnable: Job[] = [];
    for (const job of this.ledger.jobs) {
      if (job.status === 'completed') {
        console.log(`  [skip] ${job.name} already completed`);
      } else if (isExhausted(job)) {
        console.warn(`  [skip] ${job.name} has used all ${job.maxAttempts} attempts`);
      } else if (isRunnable(job)) {
        runnable.push(job);
      }
    }

    await this.runSequence(runnable, 'first');
    return this.summary();
  }

  /** Re-runs failed and timed-out jobs that still have attempts left. */
  async retryFailed(names?: string[]): Promise<JobSummary> {
    await this.recoverInterrupted();

    if (names && names.length > 0) {
      for (const name of names) {
        if (!this.ledger.find(name)) console.warn(`  [warn] no job named ${name}`);
      }
    }

    const candidates = this.ledger.jobs.filter(
      (job) => isRetryable(job) && (!names || names.length === 0 || names.includes(job.name))
    );
    if (candidates.length === 0) {
      console.log('  nothing to retry');
      return this.summary();
    }

    console.log(`  retrying ${candidates.length} job(s)`);
    await this.runSequence(candidates, 'retry');
    return this.summary();
  }

  /** Runs the given jobs in order with the retry-pass delay between them. */
  async rerun(jobs: Job[]): Promise<JobSummary> {
    const runnable = jobs.filter((job) => {
      if (isRunnable(job)) return true;
      console.log(`  [skip] ${job.name} is ${job.status} (attempt ${job.attempts}/${job.maxAttempts})`);
      return false;
    });
    await this.runSequence(runnable, 'retry');
    return this.summary();
  }

  hasRetryable(names?: string[]): boolean {
    return this.ledger.jobs.some(
      (job) => isRetryable(job) && (!names || names.length === 0 || names.includes(job.name))
    );
  }

  /** Manual override: gives jobs a fresh set of attempts. */
  async resetJobs(names?: string[]): Promise<Job[]> {
    const targets = this.ledger.jobs.filter((job) =>
      names && names.length > 0 ? names.includes(job.name) : isExhausted(job)
    );
    const reset: Job[] = [];
    for (const job of targets) {
      if (job.status === 'completed' || job.status === 'running') {
        console.warn(`  [warn] ${job.name} is ${job.status}; not resetting`);
        continue;
      }
      transition(job, { type: 'reset' }, this.clock());
      reset.push(job);
    }
    if (reset.length > 0) await this.ledger.save(this.clock());
    return reset;
  }

  summary(): JobSummary {
    return summarizeJobs(this.ledger.jobs);
  }
}

export function summarizeJobs(jobs: Job[]): JobSummary {
  const byStatus: Record<JobStatus, number> = {
    pending: 0,
    running: 0,
    completed: 0,
    failed: 0,
    timed_out: 0,
  };
  for (const job of jobs) byStatus[job.status]++;

  return {
    total: jobs.length,
    byStatus,
    completionRate: jobs.length > 0 ? byStatus.completed / jobs.length : 0,
    unfinished: jobs
      .filter((job) => job.status !== 'completed')
      .map((job) => ({
        name: job.name,
        status: job.status,
        attempts: job.attempts,
        maxAttempts: job.maxAttempts,
        reason: job.errorMessage,
        category: job.failureCategory,
        rows: describeRows(job),
      })),
  };
}

export function printSummary(summary: JobSummary): void {
  const { byStatus } = summary;
  console.log('\n[mmbatch] summary');
  console.log(`  jobs: ${summary.total}`);
  console.log(`  completed: ${byStatus.completed}`);
  console.log(`  failed/timed out: ${byStatus.failed + byStatus.timed_out}`);
  console.log(`  pending: ${byStatus.pending}`);
  console.log(`  completion: ${(summary.completionRate * 100).toFixed(1)}%`);

  if (summary.unfinished.length > 0) {
    console.error('\n[mmbatch] unfinished jobs:');
    for (const job of summary.unfinished) {
      const category = job.category ? ` [${describeCategory(job.category)}]` : '';
      const reason = job.reason ? `: ${job.reason}` : '';
      console.error(
        `  ${job.name} ${job.status} attempts ${job.attempts}/${job.maxAttempts} (${job.rows})${reason}${category}`
      );
    }
  }
}
