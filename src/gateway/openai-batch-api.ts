import OpenAI, { toFile } from 'openai';
import type { BatchApi, BatchState, BatchStatus } from './types.js';

const KNOWN_STATES: readonly BatchState[] = [
  'validating',
  'in_progress',
  'finalizing',
  'completed',
  'failed',
  'expired',
  'cancelling',
  'cancelled',
];

function toBatchState(status: string): BatchState {
  const match = KNOWN_STATES.find((s) => s === status);
  if (!match) {
    throw new Error(`Provider returned unknown batch status "${status}"`);
  }
  return match;
}

export interface OpenAIBatchApiOptions {
  apiKey: string;
  baseURL?: string;
}

export class OpenAIBatchApi implements BatchApi {
  private readonly client: OpenAI;

  constructor(opts: OpenAIBatchApiOptions) {
    if (!opts.apiKey) {
      throw new Error(
        'OPENAI_API_KEY environment variable is required to reach the Batch API.\n' +
        'Set it with: export OPENAI_API_KEY=...'
      );
    }
    this.client = new OpenAI({ apiKey: opts.apiKey, baseURL: opts.baseURL });
  }

  async uploadFile(content: string, filename: string, signal?: AbortSignal): Promise<string> {
    const file = await toFile(Buffer.from(content, 'utf-8'), filename);
    const res = await this.client.files.create({ file, purpose: 'batch' }, { signal });
    return res.id;
  }

  async createBatch(inputFileId: string, completionWindow: string, signal?: AbortSignal): Promise<string> {
    if (completionWindow !== '24h') {
      throw new Error(`Unsupported completion window "${completionWindow}" (the Batch API accepts 24h)`);
    }
    const res = await this.client.batches.create(
      {
        input_file_id: inputFileId,
        endpoint: '/v1/chat/completions',
        completion_window: completionWindow,
      },
      { signal }
    );
    return res.id;
  }

  async retrieveBatch(batchId: string, signal?: AbortSignal): Promise<BatchStatus> {
    const batch = await this.client.batches.retrieve(batchId, { signal });
    const errors = (batch.errors?.data ?? []).map((e) => ({
      code: e.code ?? undefined,
      message: e.message ?? 'unspecified batch error',
    }));

    return {
      id: batch.id,
      status: toBatchState(batch.status),
      counts: {
        total: batch.request_counts?.total ?? 0,
        completed: batch.request_counts?.completed ?? 0,
        failed: batch.request_counts?.failed ?? 0,
      },
      outputFileId: batch.output_file_id ?? undefined,
      errorFileId: batch.error_file_id ?? undefined,
      errors,
    };
  }

  async fetchFileContent(fileId: string, signal?: AbortSignal): Promise<string> {
    const res = await this.client.files.content(fileId, { signal });
    return res.text();
  }

  async cancelBatch(batchId: string, signal?: AbortSignal): Promise<void> {
    await this.client.batches.cancel(batchId, { signal });
  }
}

/** HTTP status and provider error code of an SDK error, when it carries them. */
export function apiErrorDetails(err: unknown): { httpStatus?: number; code?: string } {
  if (err instanceof OpenAI.APIError) {
    return {
      httpStatus: typeof err.status === 'number' ? err.status : undefined,
      code: typeof err.code === 'string' ? err.code : undefined,
    };
  }
  return {};
}
