import { parseCustomId } from '../utils/id.js';
import type { Outcome, ParsedLine } from './types.js';

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function errorMessage(value: unknown): string | null {
  if (typeof value === 'string' && value) return value;
  if (isObject(value) && typeof value.message === 'string' && value.message) return value.message;
  return null;
}

/** Reads the outcome out of a result line's response, never dropping it. */
export function extractOutcome(line: JsonObject): Outcome {
  const topError = errorMessage(line.error);
  if (topError) return { kind: 'error', reason: topError };

  const response = line.response;
  if (!isObject(response)) return { kind: 'error', reason: 'no response' };

  const body = response.body;
  const statusCode = response.status_code;
  if (typeof statusCode === 'number' && (statusCode < 200 || statusCode >= 300)) {
    const bodyError = isObject(body) ? errorMessage(body.error) : null;
    return { kind: 'error', reason: bodyError ?? `http ${statusCode}` };
  }

  if (!isObject(body)) return { kind: 'error', reason: 'no body' };

  const choices = body.choices;
  if (!Array.isArray(choices) || choices.length === 0) {
    return { kind: 'error', reason: 'no choices' };
  }

  const first: unknown = choices[0];
  const message = isObject(first) ? first.message : undefined;
  if (!isObject(message)) return { kind: 'error', reason: 'no message' };

  if (typeof message.refusal === 'string' && message.refusal) {
    return { kind: 'refusal', text: message.refusal };
  }
  if (typeof message.content === 'string') {
    return { kind: 'content', text: message.content };
  }
  return { kind: 'error', reason: 'no content' };
}

export function parseResultLine(raw: string): ParsedLine {
  const line = raw.trim();
  if (!line) return { kind: 'blank' };

  let data: unknown;
  try {
    data = JSON.parse(line);
  } catch (err) {
    return { kind: 'decode_error', message: err instanceof Error ? err.message : String(err) };
  }

  if (!isObject(data)) {
    return { kind: 'decode_error', message: 'line is not a JSON object' };
  }

  const customId = typeof data.custom_id === 'string' ? data.custom_id : '';
  const index = parseCustomId(customId);
  if (index === null) return { kind: 'foreign', customId };

  return { kind: 'outcome', index, outcome: extractOutcome(data) };
}

export function parseResultText(content: string): ParsedLine[] {
  return content.split(/\r?\n/).map(parseResultLine);
}

/** Row indices a result file has an outcome for, in file order. */
export function outcomeIndices(content: string): { indices: number[]; foreign: string[] } {
  const indices: number[] = [];
  const foreign: string[] = [];
  for (const parsed of parseResultText(content)) {
    if (parsed.kind === 'outcome') indices.push(parsed.index);
    else if (parsed.kind === 'foreign') foreign.push(parsed.customId);
  }
  return { indices, foreign };
}
