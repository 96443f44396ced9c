import type { FailureCategory } from './types.js';

export interface FailureSignal {
  message: string;
  code?: string;
  httpStatus?: number;
}

export const FAILURE_PATTERNS: [RegExp, FailureCategory][] = [
  [/quota|billing|credit balance/i, 'quota'],
  [/rate.?limit|too many requests/i, 'rate_limit'],
  [/api.?key|authenticat|unauthori[sz]ed|permission|forbidden/i, 'credential'],
  [/time(?:d)?.?out|expired/i, 'timeout'],
  [/validation|invalid|malformed|no valid requests/i, 'input_validation'],
];

function fromCode(code: string): FailureCategory | null {
  const lower = code.toLowerCase();
  if (lower.includes('quota') || lower.includes('billing')) return 'quota';
  if (lower.includes('rate_limit')) return 'rate_limit';
  if (lower.includes('api_key') || lower.includes('auth')) return 'credential';
  if (lower.includes('timeout') || lower.includes('expired')) return 'timeout';
  if (lower.includes('invalid') || lower.includes('validation')) return 'input_validation';
  return null;
}

function fromHttpStatus(status: number): FailureCategory | null {
  if (status === 401 || status === 403) return 'credential';
  if (status === 429) return 'rate_limit';
  if (status === 408 || status === 504) return 'timeout';
  if (status === 400 || status === 422) return 'input_validation';
  return null;
}

/**
 * Maps a failure to a diagnostic category. Only used for reporting; the
 * orchestrator's control flow never reads the result.
 */
export function classifyFailure(signal: FailureSignal): FailureCategory {
  if (signal.code) {
    const byCode = fromCode(signal.code);
    if (byCode) return byCode;
  }

  if (signal.httpStatus !== undefined) {
    const byStatus = fromHttpStatus(signal.httpStatus);
    if (byStatus) return byStatus;
  }

  for (const [pattern, category] of FAILURE_PATTERNS) {
    if (pattern.test(signal.message)) return category;
  }

  return 'unknown';
}

export function describeCategory(category: FailureCategory): string {
  switch (category) {
    case 'quota':
      return 'API quota or billing limit';
    case 'rate_limit':
      return 'rate limited';
    case 'credential':
      return 'API key or permission problem';
    case 'timeout':
      return 'timed out';
    case 'input_validation':
      return 'input rejected';
    case 'unknown':
      return 'unknown';
  }
}
