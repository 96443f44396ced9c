import { readdir, readFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { isNotFound } from '../utils/fs.js';
import { runPaths } from '../ledger/run-paths.js';
import type { JobLedger } from '../ledger/ledger.js';
import type { ResultFile } from './types.js';

const RESULT_FILE = /^batch_results_.*\.jsonl$/;
const ERROR_FILE = /^batch_errors_.*\.jsonl$/;

export interface CollectOptions {
  includeErrors?: boolean;
}

async function listDir(dir: string): Promise<string[]> {
  try {
    return await readdir(dir);
  } catch (err) {
    if (isNotFound(err)) return [];
    throw err;
  }
}

/**
 * Lists the run's result files in merge order: the ledger's jobs in ledger
 * order (each job's error files before its result files, attempts in order),
 * then any other result files in the results directory sorted by name.
 */
export async function listResultFiles(
  runDir: string,
  ledger: JobLedger | null,
  opts: CollectOptions = {}
): Promise<string[]> {
  const paths = runPaths(runDir);
  const ordered: string[] = [];
  const seen = new Set<string>();

  const push = (absolute: string) => {
    if (seen.has(absolute)) return;
    seen.add(absolute);
    ordered.push(absolute);
  };

  for (const job of ledger?.jobs ?? []) {
    if (opts.includeErrors) job.errorFiles.forEach((f) => push(paths.resolve(f)));
    job.resultFiles.forEach((f) => push(paths.resolve(f)));
  }

  const strays = (await listDir(paths.resultsDir))
    .filter((name) => RESULT_FILE.test(name) || (opts.includeErrors === true && ERROR_FILE.test(name)))
    .sort();
  for (const name of strays) push(join(paths.resultsDir, name));

  return ordered;
}

export async function loadResultFiles(files: string[]): Promise<ResultFile[]> {
  const loaded: ResultFile[] = [];
  for (const path of files) {
    try {
      loaded.push({ name: basename(path), content: await readFile(path, 'utf-8') });
    } catch (err) {
      if (!isNotFound(err)) throw err;
      console.warn(`  [warn] result file listed in the ledger is gone: ${path}`);
    }
  }
  return loaded;
}
