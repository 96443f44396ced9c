import { describe, it, expect, beforeEach, vi } from 'vitest';
import { mkdir, readFile, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { loadConfig } from '../config.js';
import { JobLedger } from '../ledger/ledger.js';
import { parseRecordTable } from '../records/record-table.js';
import { indexSetDigest } from '../utils/id.js';
import { mergeRun, retryMissing, runRecords } from '../control-plane/workflow.js';
import type { WorkflowDeps } from '../control-plane/workflow.js';
import type { BatchGateway, BatchStatus, GatewayResult, RunBatchOptions } from '../gateway/types.js';
import { NOW, contentLine, errorLine, jsonl, makeJob, makeTempDir, noChoicesLine, silenceConsole } from './fixtures.js';

class EchoGateway implements BatchGateway {
  labels: string[] = [];
  /** Rows the provider drops from its answer. */
  drop = new Set<number>();

  async runBatch(input: string, opts: RunBatchOptions): Promise<GatewayResult> {
    this.labels.push(opts.label);
    await opts.onSubmitted?.(`batch_${this.labels.length}`);
    const rows = [...input.matchAll(/"custom_id":"row_(\d+)"/g)]
      .map((m) => Number(m[1]))
      .filter((i) => !this.drop.has(i));
    return {
      ok: true,
      batchId: `batch_${this.labels.length}`,
      counts: { total: rows.length, completed: rows.length, failed: 0 },
      outputText: jsonl(rows.map((i) => contentLine(i, `answer ${i}`))),
    };
  }

  async inspect(batchId: string): Promise<BatchStatus> {
    return { id: batchId, status: 'completed', counts: { total: 0, completed: 0, failed: 0 }, errors: [] };
  }
}

async function readColumn(path: string, column: string): Promise<string[]> {
  const table = parseRecordTable(await readFile(path, 'utf-8'));
  return table.rows.map((row) => row.values[column]);
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

describe('mergeRun', () => {
  let dir: string;
  let records: string;

  beforeEach(async () => {
    silenceConsole();
    dir = await makeTempDir();
    records = join(dir, 'records.csv');
    await writeFile(records, 'image_path,prompt\n' + [0, 1, 2, 3, 4].map((i) => `img_${i}.png,describe ${i}\n`).join(''));
    await mkdir(join(dir, 'results'));
  });

  it('writes the merged table and the rows still missing', async () => {
    await writeFile(
      join(dir, 'results', 'batch_results_batch_001_a1.jsonl'),
      jsonl([contentLine(0, 'A'), contentLine(1, 'B'), noChoicesLine(2)])
    );
    await writeFile(join(dir, 'results', 'batch_results_batch_002_a1.jsonl'), jsonl([contentLine(3, 'D')]));
    const output = join(dir, 'merged.csv');

    const report = await mergeRun({ runDir: dir, recordsPath: records, outputPath: output, includeErrors: false });

    expect(report.counts).toEqual({ completed: 4, missing: 1, duplicate: 0 });
    expect(await readColumn(output, 'outcome_status')).toEqual(['Completed', 'Completed', 'Completed', 'Completed', 'Missing']);
    expect(await readColumn(output, 'response_text')).toEqual(['A', 'B', 'no choices', 'D', '']);
    expect(await readColumn(output, 'prompt')).toEqual(['describe 0', 'describe 1', 'describe 2', 'describe 3', 'describe 4']);
    expect(await readFile(join(dir, 'merged_missing_rows.txt'), 'utf-8')).toBe('5\n');
  });

  it('removes a stale missing-rows file once every row is present', async () => {
    await writeFile(
      join(dir, 'results', 'batch_results_batch_001_a1.jsonl'),
      jsonl([0, 1, 2, 3, 4].map((i) => contentLine(i, 'ok')))
    );
    const output = join(dir, 'merged.csv');
    await writeFile(join(dir, 'merged_missing_rows.txt'), '5\n');

    await mergeRun({ runDir: dir, recordsPath: records, outputPath: output, includeErrors: false });

    expect(await exists(join(dir, 'merged_missing_rows.txt'))).toBe(false);
  });

  it('merges in ledger order, not name order', async () => {
    await writeFile(join(dir, 'results', 'batch_results_batch_001_a1.jsonl'), jsonl([contentLine(0, 'from batch_001')]));
    await writeFile(join(dir, 'results', 'batch_results_batch_002_a1.jsonl'), jsonl([contentLine(0, 'from batch_002')]));
    const ledger = await JobLedger.open(dir);
    ledger.add(makeJob({ name: 'batch_002', resultFiles: ['results/batch_results_batch_002_a1.jsonl'] }));
    ledger.add(makeJob({ name: 'batch_001', resultFiles: ['results/batch_results_batch_001_a1.jsonl'] }));
    await ledger.save(NOW);
    const output = join(dir, 'merged.csv');

    const report = await mergeRun({ runDir: dir, recordsPath: records, outputPath: output, includeErrors: false });

    expect(report.rows[0].responseText).toBe('from batch_001');
    expect(report.counts.duplicate).toBe(1);
  });

  it('reads error files only when asked', async () => {
    await writeFile(join(dir, 'results', 'batch_errors_batch_001_a1.jsonl'), jsonl([errorLine(3, 'bad image')]));
    const output = join(dir, 'merged.csv');

    const without = await mergeRun({ runDir: dir, recordsPath: records, outputPath: output, includeErrors: false });
    expect(without.rows[3].outcomeStatus).toBe('Missing');

    const withErrors = await mergeRun({ runDir: dir, recordsPath: records, outputPath: output, includeErrors: true });
    expect(withErrors.rows[3]).toMatchObject({ outcomeStatus: 'Completed', outcomeKind: 'error', responseText: 'bad image' });
  });
});

describe('runRecords and retryMissing', () => {
  let dir: string;
  let deps: WorkflowDeps;
  let gateway: EchoGateway;

  beforeEach(async () => {
    silenceConsole();
    dir = await makeTempDir();
    await writeFile(join(dir, 'a.png'), Buffer.from([0x89, 0x50, 0x4e, 0x47]));
    await writeFile(join(dir, 'records.csv'), 'image_path,prompt\na.png,one\na.png,two\na.png,three\n');
    gateway = new EchoGateway();
    deps = { config: loadConfig({}), gateway, sleep: vi.fn(async (_ms: number) => {}), clock: () => NOW };
  });

  function execution() {
    return {
      runDir: join(dir, 'run'),
      model: 'gpt-4o-mini',
      jobTimeoutMs: 60_000,
      verify: 'overlap' as const,
      imageRoot: dir,
    };
  }

  it('plans, runs and records the run', async () => {
    const summary = await runRecords(
      { ...execution(), recordsPath: join(dir, 'records.csv'), batchSize: 2, start: 0, retry: true },
      deps
    );

    expect(summary.total).toBe(2);
    expect(summary.byStatus.completed).toBe(2);
    expect(gateway.labels).toEqual(['batch_001_a1', 'batch_002_a1']);

    const ledger = await JobLedger.open(join(dir, 'run'));
    expect(ledger.run).toEqual({ recordsPath: join(dir, 'records.csv'), model: 'gpt-4o-mini', batchSize: 2 });
    expect(ledger.jobs.map((j) => [j.name, j.startIndex, j.endIndex, j.providerBatchId])).toEqual([
      ['batch_001', 0, 2, 'batch_1'],
      ['batch_002', 2, 3, 'batch_2'],
    ]);
  });

  it('does not run completed jobs again', async () => {
    const opts = { ...execution(), recordsPath: join(dir, 'records.csv'), batchSize: 2, start: 0, retry: true };
    await runRecords(opts, deps);
    await runRecords(opts, deps);
    expect(gateway.labels).toEqual(['batch_001_a1', 'batch_002_a1']);
  });

  it('runs every row of a second, earlier range in the same run directory', async () => {
    const base = { ...execution(), recordsPath: join(dir, 'records.csv'), batchSize: 2, retry: false };
    await runRecords({ ...base, start: 2 }, deps);
    const summary = await runRecords({ ...base, start: 0, end: 2 }, deps);

    expect(gateway.labels).toEqual(['batch_002_a1', 'batch_001_a1']);
    expect(summary.byStatus.completed).toBe(2);

    const merged = await mergeRun({
      runDir: join(dir, 'run'),
      recordsPath: join(dir, 'records.csv'),
      outputPath: join(dir, 'merged.csv'),
      includeErrors: false,
    });
    expect(merged.counts).toEqual({ completed: 3, missing: 0, duplicate: 0 });
  });

  it('rejects a row range outside the table', async () => {
    await expect(
      runRecords({ ...execution(), recordsPath: join(dir, 'records.csv'), batchSize: 2, start: 0, end: 4, retry: false }, deps)
    ).rejects.toThrow(/Row range 1-4 is outside/);
  });

  it('closes the gap left by a partial answer', async () => {
    gateway.drop = new Set([1, 2]);
    await runRecords(
      { ...execution(), recordsPath: join(dir, 'records.csv'), batchSize: 3, start: 0, retry: false },
      deps
    );

    const output = join(dir, 'merged.csv');
    const first = await mergeRun({
      runDir: join(dir, 'run'),
      recordsPath: join(dir, 'records.csv'),
      outputPath: output,
      includeErrors: false,
    });
    expect(first.missingRows).toEqual([2, 3]);

    gateway.drop = new Set();
    const summary = await retryMissing(
      { ...execution(), missingFile: join(dir, 'merged_missing_rows.txt'), batchSize: 20 },
      deps
    );
    expect(summary.byStatus.completed).toBe(1);
    expect(gateway.labels).toEqual(['batch_001_a1', `retry_${indexSetDigest([1, 2])}_001_a1`]);

    const second = await mergeRun({
      runDir: join(dir, 'run'),
      recordsPath: join(dir, 'records.csv'),
      outputPath: output,
      includeErrors: false,
    });
    expect(second.counts).toEqual({ completed: 3, missing: 0, duplicate: 0 });
  });
});
