import { parseResultText } from './result-parser.js';
import type { RecordTable } from '../records/record-table.js';
import type {
  MergeRange,
  MergeReport,
  Outcome,
  ReconciledRow,
  ResultFile,
} from './types.js';

export const RECONCILE_COLUMNS = ['outcome_status', 'outcome_kind', 'response_text', 'source_file'] as const;

export const REFUSAL_PREFIX = '[REFUSAL] ';

interface Placed {
  outcome: Outcome;
  source: string;
}

export function outcomeText(outcome: Outcome): string {
  switch (outcome.kind) {
    case 'content':
      return outcome.text;
    case 'refusal':
      return REFUSAL_PREFIX + outcome.text;
    case 'error':
      return outcome.reason;
  }
}

function resolveRange(size: number, range: MergeRange): { start: number; end: number } {
  const start = range.start ?? 0;
  const end = range.end ?? size;
  if (!Number.isInteger(start) || !Number.isInteger(end) || start < 0 || end < start || end > size) {
    throw new Error(`Invalid merge range [${start}, ${end}) for a table of ${size} rows`);
  }
  return { start, end };
}

/**
 * Places every outcome from the files onto the table. Files are read in the
 * order given and a later outcome for the same row replaces an earlier one.
 * The result depends only on the inputs.
 */
export function mergeResults(table: RecordTable, files: ResultFile[], range: MergeRange = {}): MergeReport {
  const size = table.rows.length;
  const { start, end } = resolveRange(size, range);

  const placed = new Map<number, Placed>();
  let duplicate = 0;
  let decodeFailures = 0;
  let foreignIds = 0;
  let outOfRange = 0;
  const perFile: MergeReport['perFile'] = [];

  for (const file of files) {
    let outcomes = 0;
    let fileDecodeFailures = 0;

    for (const parsed of parseResultText(file.content)) {
      switch (parsed.kind) {
        case 'blank':
          break;
        case 'decode_error':
          fileDecodeFailures++;
          break;
        case 'foreign':
          foreignIds++;
          break;
        case 'outcome':
          outcomes++;
          if (parsed.index >= size) {
            outOfRange++;
            break;
          }
          if (placed.has(parsed.index)) duplicate++;
          placed.set(parsed.index, { outcome: parsed.outcome, source: file.name });
          break;
      }
    }

    decodeFailures += fileDecodeFailures;
    perFile.push({ name: file.name, outcomes, decodeFailures: fileDecodeFailures });
  }

  const rows = table.rows.map((record): ReconciledRow => {
    const hit = placed.get(record.index);
    if (!hit) {
      return {
        index: record.index,
        values: record.values,
        outcomeStatus: 'Missing',
        outcomeKind: '',
        responseText: '',
        sourceFile: '',
      };
    }
    return {
      index: record.index,
      values: record.values,
      outcomeStatus: 'Completed',
      outcomeKind: hit.outcome.kind,
      responseText: outcomeText(hit.outcome),
      sourceFile: hit.source,
    };
  });

  const completed = rows.filter((r) => r.outcomeStatus === 'Completed').length;
  const missingRows = rows
    .filter((r) => r.outcomeStatus === 'Missing' && r.index >= start && r.index < end)
    .map((r) => r.index + 1);

  return {
    rows,
    counts: { completed, missing: size - completed, duplicate },
    decodeFailures,
    foreignIds,
    outOfRange,
    missingRows,
    perFile,
  };
}

export function reconciledColumns(table: RecordTable): string[] {
  const extra = RECONCILE_COLUMNS.filter((c) => !table.columns.includes(c));
  return [...table.columns, ...extra];
}

export function toOutputRecords(rows: ReconciledRow[]): Array<Record<string, string>> {
  return rows.map((row) => ({
    ...row.values,
    outcome_status: row.outcomeStatus,
    outcome_kind: row.outcomeKind,
    response_text: row.responseText,
    source_file: row.sourceFile,
  }));
}
