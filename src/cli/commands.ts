import { Command, InvalidArgumentError } from 'commander';
import { loadConfig } from '../config.js';
import {
  mergeRun,
  retryJobs,
  retryMissing,
  runRecords,
  showCosts,
  showEstimate,
  showStatus,
} from '../control-plane/workflow.js';
import type { AppConfig } from '../config.js';
import type { ExecutionOptions, WorkflowDeps } from '../control-plane/workflow.js';
import type { JobSummary, VerifyMode } from '../control-plane/types.js';

interface ExecutionFlags {
  runDir?: string;
  model?: string;
  timeout?: number;
  verify?: VerifyMode;
  imageRoot?: string;
}

interface RunFlags extends ExecutionFlags {
  batchSize?: number;
  start?: number;
  end?: number;
  retry: boolean;
}

interface RetryFlags extends ExecutionFlags {
  reset?: boolean;
}

interface RetryMissingFlags extends ExecutionFlags {
  missingFile: string;
  batchSize?: number;
  records?: string;
}

interface MergeFlags {
  start?: number;
  end?: number;
  includeErrors?: boolean;
}

function positiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('expected a positive integer');
  }
  return n;
}

/** 1-based row number on the command line, 0-based index inside. */
function rowNumber(value: string): number {
  return positiveInt(value) - 1;
}

function verifyMode(value: string): VerifyMode {
  if (value !== 'overlap' && value !== 'exact') {
    throw new InvalidArgumentError('expected overlap or exact');
  }
  return value;
}

function execution(flags: ExecutionFlags, config: AppConfig, runDir?: string): ExecutionOptions {
  return {
    runDir: runDir ?? flags.runDir ?? config.batch.runDir,
    model: flags.model ?? config.openai.model,
    jobTimeoutMs: flags.timeout !== undefined ? flags.timeout * 1000 : config.batch.jobTimeoutMs,
    verify: flags.verify ?? config.batch.verify,
    imageRoot: flags.imageRoot ?? process.cwd(),
  };
}

function addExecutionOptions(cmd: Command): Command {
  return cmd
    .option('--model <model>', 'Model for every request (default: MMBATCH_MODEL or gpt-4o-mini)')
    .option('--timeout <seconds>', 'Per-job timeout in seconds', positiveInt)
    .option('--verify <mode>', 'Result verification: overlap or exact', verifyMode)
    .option('--image-root <dir>', 'Directory relative image paths resolve against (default: cwd)');
}

function exitOnUnfinished(summary: JobSummary): void {
  if (summary.byStatus.completed < summary.total) process.exitCode = 1;
}

export function buildCli(deps: Partial<WorkflowDeps> = {}): Command {
  const program = new Command();
  const workflowDeps = (): WorkflowDeps => ({ ...deps, config: deps.config ?? loadConfig() });

  program
    .name('mmbatch')
    .description(
      'Batch image+prompt records through the OpenAI Batch API.\n\n' +
      'Plans the records into jobs, runs each job with bounded retries, keeps a\n' +
      'persistent ledger, and reconciles result files into one table.'
    )
    .version('0.1.0');

  addExecutionOptions(
    program
      .command('run')
      .description('Plan jobs over a records CSV and run them')
      .argument('<records>', 'CSV with an image path and a prompt column')
      .option('--run-dir <dir>', 'Directory for the ledger, inputs and results (default: MMBATCH_RESULTS_DIR or output)')
      .option('--batch-size <n>', 'Rows per job', positiveInt)
      .option('--start <row>', 'First row to process (1-based)', rowNumber)
      .option('--end <row>', 'Last row to process (1-based, inclusive)', positiveInt)
      .option('--no-retry', 'Skip the retry passes after the first run')
  ).action(async (records: string, flags: RunFlags) => {
    const wdeps = workflowDeps();
    const summary = await runRecords(
      {
        ...execution(flags, wdeps.config),
        recordsPath: records,
        batchSize: flags.batchSize ?? wdeps.config.batch.batchSize,
        start: flags.start ?? 0,
        end: flags.end,
        retry: flags.retry,
      },
      wdeps
    );
    exitOnUnfinished(summary);
  });

  addExecutionOptions(
    program
      .command('retry')
      .description('Re-run failed and timed-out jobs that have attempts left')
      .argument('[jobs...]', 'Only these job names')
      .option('--run-dir <dir>', 'Run directory holding the ledger')
      .option('--reset', 'Give the named (or all exhausted) jobs a fresh set of attempts first')
  ).action(async (jobs: string[], flags: RetryFlags) => {
    const wdeps = workflowDeps();
    const summary = await retryJobs(
      { ...execution(flags, wdeps.config), names: jobs, reset: flags.reset === true },
      wdeps
    );
    exitOnUnfinished(summary);
  });

  program
    .command('merge')
    .description('Reconcile a run\'s result files into one CSV and list the rows still missing')
    .argument('<run-dir>', 'Run directory holding the ledger and results/')
    .argument('<records>', 'The records CSV the run was planned from')
    .argument('<output>', 'Merged CSV to write')
    .option('--start <row>', 'First row checked for completeness (1-based)', rowNumber)
    .option('--end <row>', 'Last row checked for completeness (1-based, inclusive)', positiveInt)
    .option('--include-errors', 'Also merge the provider\'s error files')
    .action(async (runDir: string, records: string, output: string, flags: MergeFlags) => {
      await mergeRun({
        runDir,
        recordsPath: records,
        outputPath: output,
        start: flags.start,
        end: flags.end,
        includeErrors: flags.includeErrors === true,
      });
    });

  addExecutionOptions(
    program
      .command('retry-missing')
      .description('Plan and run a retry round for the rows listed in a missing-rows file')
      .argument('<run-dir>', 'Run directory holding the ledger')
      .requiredOption('--missing-file <path>', 'File of 1-based row numbers, one per line')
      .option('--batch-size <n>', 'Rows per job', positiveInt)
      .option('--records <path>', 'Records CSV (default: the one named in the ledger)')
  ).action(async (runDir: string, flags: RetryMissingFlags) => {
    const wdeps = workflowDeps();
    const summary = await retryMissing(
      {
        ...execution(flags, wdeps.config, runDir),
        missingFile: flags.missingFile,
        batchSize: flags.batchSize ?? wdeps.config.batch.batchSize,
        recordsPath: flags.records,
      },
      wdeps
    );
    exitOnUnfinished(summary);
  });

  program
    .command('status')
    .description('Show the ledger\'s jobs and their outcome')
    .argument('<run-dir>', 'Run directory holding the ledger')
    .option('--remote', 'Also ask the provider for the status of every submitted batch')
    .action(async (runDir: string, flags: { remote?: boolean }) => {
      const summary = await showStatus(runDir, flags.remote === true, workflowDeps());
      exitOnUnfinished(summary);
    });

  program
    .command('costs')
    .description('Show the recorded spend of a run')
    .argument('<run-dir>', 'Run directory holding batch_costs.json')
    .action(async (runDir: string) => {
      await showCosts(runDir);
    });

  program
    .command('estimate')
    .description('Estimate the cost of a number of requests')
    .argument('<count>', 'Number of requests', positiveInt)
    .option('--model <model>', 'Model to price')
    .action((count: number, flags: { model?: string }) => {
      showEstimate(count, flags.model ?? workflowDeps().config.openai.model);
    });

  return program;
}
