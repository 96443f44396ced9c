export type Outcome =
  | { kind: 'content'; text: string }
  | { kind: 'refusal'; text: string }
  | { kind: 'error'; reason: string };

export type ParsedLine =
  | { kind: 'outcome'; index: number; outcome: Outcome }
  | { kind: 'foreign'; customId: string }
  | { kind: 'blank' }
  | { kind: 'decode_error'; message: string };

export interface ResultFile {
  /** Shown in the source_file column; usually the file's base name. */
  name: string;
  content: string;
}

export type OutcomeStatus = 'Completed' | 'Missing';

export interface ReconciledRow {
  index: number;
  values: Record<string, string>;
  outcomeStatus: OutcomeStatus;
  outcomeKind: Outcome['kind'] | '';
  responseText: string;
  sourceFile: string;
}

export interface MergeCounts {
  completed: number;
  missing: number;
  duplicate: number;
}

export interface MergeReport {
  rows: ReconciledRow[];
  counts: MergeCounts;
  /** Lines that were not valid JSON objects. */
  decodeFailures: number;
  /** Lines whose custom_id is not row_<index>. */
  foreignIds: number;
  /** Outcomes whose index falls outside the table. */
  outOfRange: number;
  /** 1-based row numbers still missing within the validated range. */
  missingRows: number[];
  perFile: Array<{ name: string; outcomes: number; decodeFailures: number }>;
}

export interface MergeRange {
  start?: number;
  end?: number;
}
