import { join } from 'node:path';
import { LEDGER_FILENAME } from './ledger.js';

export const COSTS_FILENAME = 'batch_costs.json';

export interface RunPaths {
  root: string;
  ledger: string;
  costs: string;
  inputsDir: string;
  resultsDir: string;
  /** Paths under the run directory, as stored in the ledger. */
  inputFile(jobName: string): string;
  resultFile(jobName: string, attempt: number): string;
  errorFile(jobName: string, attempt: number): string;
  resolve(relative: string): string;
}

export function runPaths(root: string): RunPaths {
  return {
    root,
    ledger: join(root, LEDGER_FILENAME),
    costs: join(root, COSTS_FILENAME),
    inputsDir: join(root, 'inputs'),
    resultsDir: join(root, 'results'),
    inputFile: (jobName) => join('inputs', `${jobName}.jsonl`),
    resultFile: (jobName, attempt) => join('results', `batch_results_${jobName}_a${attempt}.jsonl`),
    errorFile: (jobName, attempt) => join('results', `batch_errors_${jobName}_a${attempt}.jsonl`),
    resolve: (relative) => join(root, relative),
  };
}
