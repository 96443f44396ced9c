import { z } from 'zod';
import { readTextIfExists, writeJsonAtomic } from '../utils/fs.js';

/** USD per 1M tokens. */
export const MODEL_PRICING: Record<string, { input: number; output: number }> = {
  'gpt-4o': { input: 2.5, output: 10.0 },
  'gpt-4o-2024-05-13': { input: 5.0, output: 15.0 },
  'gpt-4o-mini': { input: 0.15, output: 0.6 },
  'gpt-4.1': { input: 2.0, output: 8.0 },
  'gpt-4.1-mini': { input: 0.4, output: 1.6 },
  'gpt-4.1-nano': { input: 0.1, output: 0.4 },
};

const DEFAULT_PRICED_MODEL = 'gpt-4o-mini';
export const BATCH_DISCOUNT = 0.5;
// One image (~1000 tokens) plus instruction text per request.
export const AVG_INPUT_TOKENS = 1200;
export const AVG_OUTPUT_TOKENS = 200;

export interface CostEstimate {
  numRequests: number;
  model: string;
  inputTokens: number;
  outputTokens: number;
  regularCost: number;
  batchCost: number;
  savings: number;
}

const costEntrySchema = z.object({
  job_name: z.string(),
  batch_id: z.string(),
  timestamp: z.string(),
  model: z.string(),
  num_requests: z.number(),
  actual_completed: z.number(),
  input_tokens: z.number(),
  output_tokens: z.number(),
  regular_cost: z.number(),
  batch_cost: z.number(),
  savings: z.number(),
});

const costFileSchema = z.object({
  last_updated: z.string(),
  total_cost: z.number().default(0),
  total_input_tokens: z.number().default(0),
  total_output_tokens: z.number().default(0),
  batches: z.array(costEntrySchema).default([]),
});

export type CostEntry = z.infer<typeof costEntrySchema>;
type CostFile = z.infer<typeof costFileSchema>;

export interface CostSummary {
  totalBatches: number;
  totalRequests: number;
  totalCost: number;
  totalSavings: number;
  inputTokens: number;
  outputTokens: number;
  avgCostPerRequest: number;
}

export function estimateCost(numRequests: number, model: string): CostEstimate {
  const pricing = MODEL_PRICING[model] ?? MODEL_PRICING[DEFAULT_PRICED_MODEL];
  const inputTokens = numRequests * AVG_INPUT_TOKENS;
  const outputTokens = numRequests * AVG_OUTPUT_TOKENS;
  const regularCost = (inputTokens / 1_000_000) * pricing.input + (outputTokens / 1_000_000) * pricing.output;
  const batchCost = regularCost * BATCH_DISCOUNT;

  return {
    numRequests,
    model,
    inputTokens,
    outputTokens,
    regularCost,
    batchCost,
    savings: regularCost - batchCost,
  };
}

/** Running spend estimate for one run, kept next to the job ledger. */
export class CostLedger {
  private constructor(
    readonly path: string,
    private data: CostFile
  ) {}

  static async open(path: string): Promise<CostLedger> {
    const raw = await readTextIfExists(path);
    if (raw === null) {
      return new CostLedger(path, {
        last_updated: new Date().toISOString(),
        total_cost: 0,
        total_input_tokens: 0,
        total_output_tokens: 0,
        batches: [],
      });
    }
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      throw new Error(
        `Cost file ${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`
      );
    }
    const parsed = costFileSchema.safeParse(data);
    if (!parsed.success) {
      throw new Error(`Cost file ${path} failed validation: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
    }
    return new CostLedger(path, parsed.data);
  }

  get entries(): readonly CostEntry[] {
    return this.data.batches;
  }

  async record(
    jobName: string,
    batchId: string,
    estimate: CostEstimate,
    actualCompleted: number,
    now: Date = new Date()
  ): Promise<CostEntry> {
    const entry: CostEntry = {
      job_name: jobName,
      batch_id: batchId,
      timestamp: now.toISOString(),
      model: estimate.model,
      num_requests: estimate.numRequests,
      actual_completed: actualCompleted,
      input_tokens: estimate.inputTokens,
      output_tokens: estimate.outputTokens,
      regular_cost: estimate.regularCost,
      batch_cost: estimate.batchCost,
      savings: estimate.savings,
    };

    this.data.batches.push(entry);
    this.data.total_cost += estimate.batchCost;
    this.data.total_input_tokens += estimate.inputTokens;
    this.data.total_output_tokens += estimate.outputTokens;
    this.data.last_updated = now.toISOString();
    await writeJsonAtomic(this.path, this.data);
    return entry;
  }

  summary(): CostSummary {
    const totalRequests = this.data.batches.reduce((sum, b) => sum + b.actual_completed, 0);
    return {
      totalBatches: this.data.batches.length,
      totalRequests,
      totalCost: this.data.total_cost,
      totalSavings: this.data.batches.reduce((sum, b) => sum + b.savings, 0),
      inputTokens: this.data.total_input_tokens,
      outputTokens: this.data.total_output_tokens,
      avgCostPerRequest: totalRequests > 0 ? this.data.total_cost / totalRequests : 0,
    };
  }
}

export function formatUsd(amount: number): string {
  return `$${amount.toFixed(4)}`;
}
