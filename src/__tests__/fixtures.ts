import { mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { vi } from 'vitest';
import type { Job } from '../control-plane/types.js';

export const NOW = new Date('2026-01-02T03:04:05.000Z');

export function makeJob(overrides: Partial<Job> = {}): Job {
  return {
    name: 'batch_001',
    startIndex: 0,
    endIndex: 20,
    status: 'pending',
    attempts: 0,
    maxAttempts: 3,
    errorMessage: '',
    providerBatchId: '',
    resultFiles: [],
    errorFiles: [],
    createdAt: '2026-01-01T00:00:00.000Z',
    completedAt: null,
    ...overrides,
  };
}

export function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'mmbatch-test-'));
}

export function silenceConsole() {
  return {
    log: vi.spyOn(console, 'log').mockImplementation(() => {}),
    warn: vi.spyOn(console, 'warn').mockImplementation(() => {}),
    error: vi.spyOn(console, 'error').mockImplementation(() => {}),
  };
}

export function contentLine(index: number, content: string): string {
  return JSON.stringify({
    id: `batch_req_${index}`,
    custom_id: `row_${index}`,
    response: {
      status_code: 200,
      body: { choices: [{ index: 0, message: { role: 'assistant', content } }] },
    },
    error: null,
  });
}

export function refusalLine(index: number, refusal: string): string {
  return JSON.stringify({
    custom_id: `row_${index}`,
    response: {
      status_code: 200,
      body: { choices: [{ message: { role: 'assistant', content: null, refusal } }] },
    },
    error: null,
  });
}

export function noChoicesLine(index: number): string {
  return JSON.stringify({
    custom_id: `row_${index}`,
    response: { status_code: 200, body: { choices: [] } },
    error: null,
  });
}

export function errorLine(index: number, message: string): string {
  return JSON.stringify({
    custom_id: `row_${index}`,
    response: null,
    error: { code: 'server_error', message },
  });
}

export function jsonl(lines: string[]): string {
  return lines.map((line) => `${line}\n`).join('');
}
