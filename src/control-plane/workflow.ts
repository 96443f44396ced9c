import { resolve } from 'node:path';
import { JobLedger } from '../ledger/ledger.js';
import { CostLedger, estimateCost, formatUsd } from '../ledger/cost-ledger.js';
import { runPaths } from '../ledger/run-paths.js';
import { readRecordTable, writeTable } from '../records/record-table.js';
import { ImageRequestEncoder } from '../records/request-encoder.js';
import { OpenAIBatchApi } from '../gateway/openai-batch-api.js';
import { BatchSubmitter } from '../gateway/submitter.js';
import { mergeResults, reconciledColumns, toOutputRecords } from '../reconcile/merge.js';
import { listResultFiles, loadResultFiles } from '../reconcile/result-files.js';
import {
  clearMissingRows,
  missingRowsPath,
  readMissingRows,
  writeMissingRows,
} from '../reconcile/missing-rows.js';
import { JobOrchestrator, printSummary, summarizeJobs } from './orchestrator.js';
import { planIndexSet, planRange } from './planner.js';
import { RetryPolicy, realSleep } from './retry-policy.js';
import { describeRows } from './job-state.js';
import type { AppConfig } from '../config.js';
import type { BatchGateway } from '../gateway/types.js';
import type { RecordTable } from '../records/record-table.js';
import type { MergeReport } from '../reconcile/types.js';
import type { Sleep } from './retry-policy.js';
import type { JobSummary, VerifyMode } from './types.js';

export interface WorkflowDeps {
  config: AppConfig;
  /** Replaces the OpenAI-backed gateway. */
  gateway?: BatchGateway;
  sleep?: Sleep;
  clock?: () => Date;
}

export interface ExecutionOptions {
  runDir: string;
  model: string;
  jobTimeoutMs: number;
  verify: VerifyMode;
  imageRoot: string;
}

export interface RunRecordsOptions extends ExecutionOptions {
  recordsPath: string;
  batchSize: number;
  start: number;
  end?: number;
  retry: boolean;
}

export interface RetryJobsOptions extends ExecutionOptions {
  names: string[];
  reset: boolean;
}

export interface RetryMissingOptions extends ExecutionOptions {
  missingFile: string;
  batchSize: number;
  recordsPath?: string;
}

export interface MergeRunOptions {
  runDir: string;
  recordsPath: string;
  outputPath: string;
  start?: number;
  end?: number;
  includeErrors: boolean;
}

function createGateway(deps: WorkflowDeps): BatchGateway {
  if (deps.gateway) return deps.gateway;
  const { openai, batch } = deps.config;
  const api = new OpenAIBatchApi({ apiKey: openai.apiKey, baseURL: openai.baseUrl });
  return new BatchSubmitter(api, {
    completionWindow: batch.completionWindow,
    pollIntervalMs: batch.pollIntervalMs,
  });
}

async function buildOrchestrator(
  ledger: JobLedger,
  table: RecordTable,
  opts: ExecutionOptions,
  deps: WorkflowDeps
): Promise<JobOrchestrator> {
  const { config } = deps;
  const encoder = new ImageRequestEncoder(table, {
    model: opts.model,
    imageRoot: opts.imageRoot,
    ...config.records,
  });
  const costs = await CostLedger.open(runPaths(opts.runDir).costs);
  const policy = new RetryPolicy({
    maxAttempts: config.batch.maxAttempts,
    ...config.delays,
  });

  return new JobOrchestrator({
    ledger,
    encoder,
    gateway: createGateway(deps),
    costs,
    policy,
    options: {
      runDir: opts.runDir,
      model: opts.model,
      jobTimeoutMs: opts.jobTimeoutMs,
      verify: opts.verify,
    },
    sleep: deps.sleep,
    clock: deps.clock,
  });
}

/** Retry passes until no named job (or no job at all) has attempts left. */
async function retryUntilSettled(
  orchestrator: JobOrchestrator,
  deps: WorkflowDeps,
  names?: string[]
): Promise<void> {
  const sleep = deps.sleep ?? realSleep;
  let pass = 1;
  while (orchestrator.hasRetryable(names)) {
    console.log(`\n[mmbatch] retry pass ${pass++}`);
    await sleep(deps.config.delays.retryDelayMs);
    await orchestrator.retryFailed(names);
  }
}

async function recordsFor(ledger: JobLedger, explicit?: string): Promise<RecordTable> {
  const path = explicit ?? ledger.run?.recordsPath;
  if (!path) {
    throw new Error(`Ledger ${ledger.path} does not name its records file; pass --records`);
  }
  return readRecordTable(path);
}

async function openExistingLedger(runDir: string): Promise<JobLedger> {
  const ledger = await JobLedger.open(runDir);
  if (ledger.jobs.length === 0) {
    throw new Error(`No jobs found in ${ledger.path}`);
  }
  return ledger;
}

export async function runRecords(opts: RunRecordsOptions, deps: WorkflowDeps): Promise<JobSummary> {
  const recordsPath = resolve(opts.recordsPath);
  const table = await readRecordTable(recordsPath);
  const end = opts.end ?? table.rows.length;
  if (opts.start < 0 || end > table.rows.length || opts.start >= end) {
    throw new Error(
      `Row range ${opts.start + 1}-${end} is outside ${recordsPath} (${table.rows.length} rows)`
    );
  }

  console.log(`\n[mmbatch] run records=${recordsPath} rows=${opts.start + 1}-${end} model=${opts.model}`);
  console.log(`[mmbatch] run-dir=${opts.runDir} batch-size=${opts.batchSize} verify=${opts.verify}\n`);

  const ledger = await JobLedger.open(opts.runDir);
  if (ledger.run && ledger.run.recordsPath !== recordsPath) {
    console.warn(`  [warn] ledger was planned for ${ledger.run.recordsPath}`);
  }
  ledger.run = { recordsPath, model: opts.model, batchSize: opts.batchSize };

  const plan = await planRange(ledger, opts.start, end, {
    batchSize: opts.batchSize,
    maxAttempts: deps.config.batch.maxAttempts,
    now: deps.clock?.(),
  });
  console.log(`  [plan] ${plan.created.length} new job(s), ${plan.existing.length} already planned`);

  const orchestrator = await buildOrchestrator(ledger, table, opts, deps);
  await orchestrator.runAll();
  if (opts.retry) await retryUntilSettled(orchestrator, deps);

  const summary = orchestrator.summary();
  printSummary(summary);
  return summary;
}

export async function retryJobs(opts: RetryJobsOptions, deps: WorkflowDeps): Promise<JobSummary> {
  const ledger = await openExistingLedger(opts.runDir);
  const table = await recordsFor(ledger);
  const orchestrator = await buildOrchestrator(ledger, table, opts, deps);

  console.log(`\n[mmbatch] retry run-dir=${opts.runDir}${opts.names.length ? ` jobs=${opts.names.join(',')}` : ''}\n`);

  await orchestrator.recoverInterrupted();
  if (opts.reset) {
    const reset = await orchestrator.resetJobs(opts.names);
    console.log(`  reset ${reset.length} job(s)`);
    await orchestrator.rerun(reset);
  }
  await orchestrator.retryFailed(opts.names);

  const summary = orchestrator.summary();
  printSummary(summary);
  return summary;
}

export async function retryMissing(opts: RetryMissingOptions, deps: WorkflowDeps): Promise<JobSummary> {
  const requested = await readMissingRows(opts.missingFile);
  const ledger = await JobLedger.open(opts.runDir);
  if (requested.length === 0) {
    console.log(`[mmbatch] ${opts.missingFile} lists no rows; nothing to do`);
    return summarizeJobs(ledger.jobs);
  }

  const table = await recordsFor(ledger, opts.recordsPath);
  const indices = requested.filter((i) => i < table.rows.length);
  if (indices.length < requested.length) {
    console.warn(`  [warn] ignoring ${requested.length - indices.length} row(s) beyond the end of the table`);
  }

  console.log(`\n[mmbatch] retry-missing rows=${indices.length} run-dir=${opts.runDir}\n`);

  const plan = await planIndexSet(ledger, indices, {
    batchSize: opts.batchSize,
    maxAttempts: deps.config.batch.maxAttempts,
    now: deps.clock?.(),
  });
  const jobs = [...plan.created, ...plan.existing];
  for (const job of plan.created) console.log(`  [plan] ${job.name} ${describeRows(job)}`);

  const orchestrator = await buildOrchestrator(ledger, table, opts, deps);
  await orchestrator.recoverInterrupted();
  await orchestrator.rerun(jobs);
  await retryUntilSettled(orchestrator, deps, jobs.map((job) => job.name));

  const summary = summarizeJobs(jobs);
  printSummary(summary);
  return summary;
}

export async function mergeRun(opts: MergeRunOptions): Promise<MergeReport> {
  const table = await readRecordTable(opts.recordsPath);
  const ledger = (await JobLedger.exists(opts.runDir)) ? await JobLedger.open(opts.runDir) : null;
  if (!ledger) {
    console.warn(`  [warn] no ledger in ${opts.runDir}; merging result files by name`);
  }

  const files = await loadResultFiles(
    await listResultFiles(opts.runDir, ledger, { includeErrors: opts.includeErrors })
  );
  console.log(`\n[mmbatch] merge ${files.length} result file(s) into ${table.rows.length} rows`);
  if (files.length === 0) console.warn('  [warn] no result files found');

  const report = mergeResults(table, files, { start: opts.start, end: opts.end });
  await writeTable(opts.outputPath, reconciledColumns(table), toOutputRecords(report.rows));

  const missingPath = missingRowsPath(opts.outputPath);
  if (report.missingRows.length > 0) {
    await writeMissingRows(missingPath, report.missingRows);
  } else {
    await clearMissingRows(missingPath);
  }

  console.log(`  completed: ${report.counts.completed}`);
  console.log(`  missing: ${report.counts.missing}`);
  console.log(`  duplicates resolved: ${report.counts.duplicate}`);
  if (report.decodeFailures > 0) console.warn(`  [warn] ${report.decodeFailures} undecodable line(s)`);
  if (report.foreignIds > 0) console.warn(`  [warn] ${report.foreignIds} line(s) with an unknown custom_id`);
  if (report.outOfRange > 0) console.warn(`  [warn] ${report.outOfRange} outcome(s) beyond the end of the table`);
  console.log(`  wrote ${opts.outputPath}`);
  if (report.missingRows.length > 0) {
    console.log(`  ${report.missingRows.length} row(s) to retry listed in ${missingPath}`);
  }

  return report;
}

export async function showStatus(runDir: string, remote: boolean, deps: WorkflowDeps): Promise<JobSummary> {
  const ledger = await JobLedger.open(runDir);
  console.log(`\n[mmbatch] status ${ledger.path} (updated ${ledger.lastUpdated})\n`);

  for (const job of ledger.jobs) {
    const batch = job.providerBatchId ? ` batch=${job.providerBatchId}` : '';
    console.log(`  ${job.name.padEnd(18)} ${job.status.padEnd(10)} ${job.attempts}/${job.maxAttempts} ${describeRows(job)}${batch}`);
  }

  if (remote) {
    const gateway = createGateway(deps);
    console.log('\n[mmbatch] provider status');
    for (const job of ledger.jobs) {
      if (!job.providerBatchId) continue;
      try {
        const status = await gateway.inspect(job.providerBatchId);
        const { completed, failed, total } = status.counts;
        console.log(`  ${job.name} ${status.id} ${status.status} ${completed}/${total} done, ${failed} failed`);
      } catch (err) {
        console.warn(`  [warn] ${job.name}: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
  }

  const summary = summarizeJobs(ledger.jobs);
  printSummary(summary);
  return summary;
}

export async function showCosts(runDir: string): Promise<void> {
  const costs = await CostLedger.open(runPaths(runDir).costs);
  const summary = costs.summary();

  console.log(`\n[mmbatch] costs ${costs.path}\n`);
  for (const entry of costs.entries) {
    console.log(
      `  ${entry.job_name.padEnd(18)} ${entry.model} ${entry.actual_completed}/${entry.num_requests} ` +
      `${formatUsd(entry.batch_cost)}`
    );
  }
  console.log(`\n  batches: ${summary.totalBatches}`);
  console.log(`  requests completed: ${summary.totalRequests}`);
  console.log(`  tokens: ${summary.inputTokens} in, ${summary.outputTokens} out`);
  console.log(`  total cost: ${formatUsd(summary.totalCost)} (saved ${formatUsd(summary.totalSavings)})`);
  console.log(`  per request: ${formatUsd(summary.avgCostPerRequest)}`);
}

export function showEstimate(count: number, model: string): void {
  const estimate = estimateCost(count, model);
  console.log(`\n[mmbatch] estimate ${count} request(s) on ${model}\n`);
  console.log(`  tokens: ${estimate.inputTokens} in, ${estimate.outputTokens} out`);
  console.log(`  regular: ${formatUsd(estimate.regularCost)}`);
  console.log(`  batch: ${formatUsd(estimate.batchCost)} (saves ${formatUsd(estimate.savings)})`);
}
