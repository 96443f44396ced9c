import { describe, it, expect, beforeEach } from 'vitest';
import { readdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { CostLedger, estimateCost, formatUsd } from '../ledger/cost-ledger.js';
import { COSTS_FILENAME } from '../ledger/run-paths.js';
import { NOW, makeTempDir } from './fixtures.js';

describe('estimateCost', () => {
  it('prices requests at the batch discount', () => {
    const estimate = estimateCost(100, 'gpt-4o');
    expect(estimate.inputTokens).toBe(120_000);
    expect(estimate.outputTokens).toBe(20_000);
    expect(estimate.regularCost).toBeCloseTo(0.5, 10);
    expect(estimate.batchCost).toBeCloseTo(0.25, 10);
    expect(estimate.savings).toBeCloseTo(0.25, 10);
  });

  it('falls back to gpt-4o-mini pricing for unknown models', () => {
    const estimate = estimateCost(10, 'custom-model');
    expect(estimate.model).toBe('custom-model');
    expect(estimate.regularCost).toBeCloseTo(0.003, 10);
    expect(estimate.batchCost).toBeCloseTo(0.0015, 10);
  });
});

describe('CostLedger', () => {
  let path: string;

  beforeEach(async () => {
    path = join(await makeTempDir(), COSTS_FILENAME);
  });

  it('records an entry and keeps totals', async () => {
    const costs = await CostLedger.open(path);
    const entry = await costs.record('batch_001', 'batch_abc', estimateCost(10, 'gpt-4o-mini'), 9, NOW);

    expect(entry).toMatchObject({
      job_name: 'batch_001',
      batch_id: 'batch_abc',
      timestamp: '2026-01-02T03:04:05.000Z',
      num_requests: 10,
      actual_completed: 9,
    });

    const summary = costs.summary();
    expect(summary.totalBatches).toBe(1);
    expect(summary.totalRequests).toBe(9);
    expect(summary.totalCost).toBeCloseTo(0.0015, 10);
    expect(summary.inputTokens).toBe(12_000);
    expect(summary.avgCostPerRequest).toBeCloseTo(0.0015 / 9, 10);
  });

  it('persists entries across opens', async () => {
    const costs = await CostLedger.open(path);
    await costs.record('batch_001', 'batch_abc', estimateCost(10, 'gpt-4o-mini'), 10, NOW);
    await costs.record('batch_002', 'batch_def', estimateCost(5, 'gpt-4o-mini'), 5, NOW);

    const reopened = await CostLedger.open(path);
    expect(reopened.entries.map((e) => e.job_name)).toEqual(['batch_001', 'batch_002']);
    expect(reopened.summary().totalRequests).toBe(15);
    expect(await readdir(join(path, '..'))).toEqual([COSTS_FILENAME]);
  });

  it('reports zero per-request cost when nothing completed', async () => {
    const costs = await CostLedger.open(path);
    expect(costs.summary()).toEqual({
      totalBatches: 0,
      totalRequests: 0,
      totalCost: 0,
      totalSavings: 0,
      inputTokens: 0,
      outputTokens: 0,
      avgCostPerRequest: 0,
    });
  });

  it('rejects a malformed cost file', async () => {
    await writeFile(path, JSON.stringify({ batches: [] }));
    await expect(CostLedger.open(path)).rejects.toThrow(/failed validation/);
  });

  it('names the file when it is not JSON', async () => {
    await writeFile(path, '{"batches": [');
    await expect(CostLedger.open(path)).rejects.toThrow(`Cost file ${path} is not valid JSON`);
  });
});

describe('formatUsd', () => {
  it('shows four decimals', () => {
    expect(formatUsd(0.0015)).toBe('$0.0015');
    expect(formatUsd(2)).toBe('$2.0000');
  });
});
