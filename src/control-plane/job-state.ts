import type { Job, JobEvent, JobStatus } from './types.js';

export class InvalidTransitionError extends Error {
  constructor(job: Job, event: JobEvent) {
    super(`Job "${job.name}" cannot handle "${event.type}" while ${job.status}`);
    this.name = 'InvalidTransitionError';
  }
}

function assertNever(value: never): never {
  throw new Error(`Unhandled value: ${JSON.stringify(value)}`);
}

export function isRunnable(job: Job): boolean {
  switch (job.status) {
    case 'pending':
    case 'failed':
    case 'timed_out':
      return job.attempts < job.maxAttempts;
    case 'running':
    case 'completed':
      return false;
    default:
      return assertNever(job.status);
  }
}

/** Not completed and out of automatic attempts. */
export function isExhausted(job: Job): boolean {
  return job.status !== 'completed' && job.attempts >= job.maxAttempts;
}

export function isRetryable(job: Job): boolean {
  return (job.status === 'failed' || job.status === 'timed_out') && job.attempts < job.maxAttempts;
}

export function jobIndices(job: Job): number[] {
  if (job.indices) return [...job.indices];
  const out: number[] = [];
  for (let i = job.startIndex; i < job.endIndex; i++) out.push(i);
  return out;
}

export function describeRows(job: Job): string {
  if (job.indices) {
    return `${job.indices.length} rows between ${job.startIndex + 1}-${job.endIndex}`;
  }
  return `rows ${job.startIndex + 1}-${job.endIndex}`;
}

function requireStatus(job: Job, event: JobEvent, allowed: JobStatus[]): void {
  if (!allowed.includes(job.status)) {
    throw new InvalidTransitionError(job, event);
  }
}

export function transition(job: Job, event: JobEvent, now: Date = new Date()): Job {
  switch (event.type) {
    case 'start':
      if (!isRunnable(job)) throw new InvalidTransitionError(job, event);
      job.attempts += 1;
      job.status = 'running';
      return job;

    case 'complete':
      requireStatus(job, event, ['running']);
      job.status = 'completed';
      job.completedAt = now.toISOString();
      job.errorMessage = '';
      job.failureCategory = undefined;
      return job;

    case 'fail':
      requireStatus(job, event, ['running']);
      job.status = 'failed';
      job.errorMessage = event.reason;
      job.failureCategory = event.category;
      return job;

    case 'time_out':
      requireStatus(job, event, ['running']);
      job.status = 'timed_out';
      job.errorMessage = event.reason;
      job.failureCategory = 'timeout';
      return job;

    case 'interrupt':
      requireStatus(job, event, ['running']);
      job.status = 'failed';
      job.errorMessage = 'interrupted before completion';
      job.failureCategory = 'unknown';
      return job;

    case 'reset':
      requireStatus(job, event, ['pending', 'failed', 'timed_out']);
      job.status = 'pending';
      job.attempts = 0;
      job.errorMessage = '';
      job.failureCategory = undefined;
      return job;

    default:
      return assertNever(event);
  }
}
