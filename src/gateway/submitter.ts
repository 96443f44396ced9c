import { setTimeout as delay } from 'node:timers/promises';
import { apiErrorDetails } from './openai-batch-api.js';
import { TERMINAL_STATES } from './types.js';
import type {
  BatchApi,
  BatchGateway,
  BatchStatus,
  GatewayResult,
  GatewayStage,
  RunBatchOptions,
} from './types.js';

export interface SubmitterOptions {
  completionWindow: string;
  pollIntervalMs: number;
}

class StageError extends Error {
  constructor(
    readonly stage: GatewayStage,
    readonly original: unknown,
    readonly batchId?: string
  ) {
    super(original instanceof Error ? original.message : String(original));
    this.name = 'StageError';
  }
}

async function inStage<T>(stage: GatewayStage, batchId: string | undefined, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    throw new StageError(stage, err, batchId);
  }
}

function progress(status: BatchStatus): string {
  const { completed, failed, total } = status.counts;
  return `${status.status} ${completed}/${total} done, ${failed} failed`;
}

/**
 * Drives one batch from upload to downloaded results. Provider failures come
 * back as values; errors thrown by onSubmitted propagate unchanged.
 */
export class BatchSubmitter implements BatchGateway {
  constructor(
    private readonly api: BatchApi,
    private readonly opts: SubmitterOptions
  ) {}

  async runBatch(jsonl: string, options: RunBatchOptions): Promise<GatewayResult> {
    const { signal } = options;
    let batchId: string | undefined;

    try {
      const fileId = await inStage('upload', undefined, () =>
        this.api.uploadFile(jsonl, `${options.label}.jsonl`, signal)
      );
      console.log(`    uploaded ${options.label}.jsonl as ${fileId}`);

      batchId = await inStage('submit', undefined, () =>
        this.api.createBatch(fileId, this.opts.completionWindow, signal)
      );
      console.log(`    batch ${batchId} submitted`);
      await options.onSubmitted?.(batchId);

      const status = await this.waitForTerminal(batchId, signal);
      return await this.finish(status, signal);
    } catch (err) {
      if (err instanceof StageError) return this.toFailure(err, batchId, signal);
      throw err;
    }
  }

  inspect(batchId: string, signal?: AbortSignal): Promise<BatchStatus> {
    return this.api.retrieveBatch(batchId, signal);
  }

  private async waitForTerminal(batchId: string, signal?: AbortSignal): Promise<BatchStatus> {
    let last = '';
    for (;;) {
      const status = await inStage('poll', batchId, () => this.api.retrieveBatch(batchId, signal));
      const line = progress(status);
      if (line !== last) {
        console.log(`    ${line}`);
        last = line;
      }
      if (TERMINAL_STATES.has(status.status)) return status;
      await inStage('poll', batchId, () => delay(this.opts.pollIntervalMs, undefined, { signal }));
    }
  }

  private async finish(status: BatchStatus, signal?: AbortSignal): Promise<GatewayResult> {
    const firstError = status.errors[0];

    switch (status.status) {
      case 'completed':
        break;
      case 'expired':
        return {
          ok: false,
          stage: 'execution',
          message: `batch expired before completing (${progress(status)})`,
          timedOut: true,
          batchId: status.id,
          batchStatus: status.status,
          code: firstError?.code,
        };
      case 'failed':
      case 'cancelled':
        return {
          ok: false,
          stage: 'execution',
          message: firstError
            ? `batch ${status.status}: ${firstError.message}`
            : `batch ${status.status} without an error message`,
          timedOut: false,
          batchId: status.id,
          batchStatus: status.status,
          code: firstError?.code,
        };
      default:
        throw new Error(`Batch ${status.id} is not terminal (${status.status})`);
    }

    const { outputFileId, errorFileId } = status;
    const outputText = outputFileId
      ? await inStage('download', status.id, () => this.api.fetchFileContent(outputFileId, signal))
      : undefined;
    const errorText = errorFileId
      ? await inStage('download', status.id, () => this.api.fetchFileContent(errorFileId, signal))
      : undefined;

    return { ok: true, batchId: status.id, counts: status.counts, outputText, errorText };
  }

  private toFailure(err: StageError, batchId: string | undefined, signal?: AbortSignal): GatewayResult {
    const aborted = signal?.aborted ?? false;
    const reason: unknown = signal?.reason;

    return {
      ok: false,
      stage: err.stage,
      message: aborted && reason instanceof Error ? reason.message : err.message,
      timedOut: aborted,
      batchId: err.batchId ?? batchId,
      ...apiErrorDetails(err.original),
    };
  }
}
