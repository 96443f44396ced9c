export type BatchState =
  | 'validating'
  | 'in_progress'
  | 'finalizing'
  | 'completed'
  | 'failed'
  | 'expired'
  | 'cancelling'
  | 'cancelled';

export const TERMINAL_STATES: ReadonlySet<BatchState> = new Set([
  'completed',
  'failed',
  'expired',
  'cancelled',
]);

export interface RequestCounts {
  total: number;
  completed: number;
  failed: number;
}

export interface BatchStatus {
  id: string;
  status: BatchState;
  counts: RequestCounts;
  outputFileId?: string;
  errorFileId?: string;
  errors: Array<{ code?: string; message: string }>;
}

/** The provider's raw file and batch operations. */
export interface BatchApi {
  uploadFile(content: string, filename: string, signal?: AbortSignal): Promise<string>;
  createBatch(inputFileId: string, completionWindow: string, signal?: AbortSignal): Promise<string>;
  retrieveBatch(batchId: string, signal?: AbortSignal): Promise<BatchStatus>;
  fetchFileContent(fileId: string, signal?: AbortSignal): Promise<string>;
  cancelBatch(batchId: string, signal?: AbortSignal): Promise<void>;
}

export type GatewayStage = 'upload' | 'submit' | 'poll' | 'execution' | 'download';

export type GatewayResult =
  | {
      ok: true;
      batchId: string;
      counts: RequestCounts;
      outputText?: string;
      errorText?: string;
    }
  | {
      ok: false;
      stage: GatewayStage;
      message: string;
      timedOut: boolean;
      batchId?: string;
      batchStatus?: BatchState;
      code?: string;
      httpStatus?: number;
    };

export interface RunBatchOptions {
  /** Used to name the uploaded file. */
  label: string;
  signal?: AbortSignal;
  /** Called as soon as the provider has assigned a batch id. */
  onSubmitted?: (batchId: string) => void | Promise<void>;
}

/** Upload, submit, wait and download as one blocking call. */
export interface BatchGateway {
  runBatch(jsonl: string, opts: RunBatchOptions): Promise<GatewayResult>;
  inspect(batchId: string, signal?: AbortSignal): Promise<BatchStatus>;
}
