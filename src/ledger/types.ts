import { z } from 'zod';

export const JOB_STATUSES = ['pending', 'running', 'completed', 'failed', 'timed_out'] as const;

export const FAILURE_CATEGORIES = [
  'quota',
  'rate_limit',
  'credential',
  'timeout',
  'input_validation',
  'unknown',
] as const;

// Unknown keys are stripped on parse, so files written by newer versions still load.
export const jobRecordSchema = z
  .object({
    name: z.string().min(1),
    start_index: z.number().int().nonnegative(),
    end_index: z.number().int().positive(),
    indices: z.array(z.number().int().nonnegative()).optional(),
    status: z.enum(JOB_STATUSES),
    attempts: z.number().int().nonnegative().default(0),
    max_attempts: z.number().int().positive().default(3),
    error_message: z.string().default(''),
    failure_category: z.enum(FAILURE_CATEGORIES).optional(),
    provider_batch_id: z.string().default(''),
    result_files: z.array(z.string()).default([]),
    error_files: z.array(z.string()).default([]),
    submitted_rows: z.number().int().nonnegative().optional(),
    skipped_rows: z.number().int().nonnegative().optional(),
    created_at: z.string(),
    completed_at: z.string().nullable().default(null),
  })
  .refine((job) => job.start_index < job.end_index, {
    message: 'start_index must be less than end_index',
  });

export const runRecordSchema = z.object({
  records_path: z.string(),
  model: z.string(),
  batch_size: z.number().int().positive(),
});

export const ledgerFileSchema = z.object({
  last_updated: z.string(),
  total_jobs: z.number().int().nonnegative().optional(),
  run: runRecordSchema.optional(),
  jobs: z.array(jobRecordSchema).default([]),
});

export type JobRecord = z.infer<typeof jobRecordSchema>;
export type LedgerFile = z.infer<typeof ledgerFileSchema>;
