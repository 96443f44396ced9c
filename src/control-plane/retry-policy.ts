import { setTimeout as delay } from 'node:timers/promises';

export type Sleep = (ms: number) => Promise<void>;

export const realSleep: Sleep = async (ms) => {
  if (ms > 0) await delay(ms);
};

export type PassKind = 'first' | 'retry';

/**
 * Fixed delays between jobs. There is no exponential growth or jitter: the
 * delays only exist to stay under the provider's rate limits.
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  readonly successDelayMs: number;
  readonly failureDelayMs: number;
  readonly retryDelayMs: number;

  constructor(opts: Partial<Pick<RetryPolicy, 'maxAttempts' | 'successDelayMs' | 'failureDelayMs' | 'retryDelayMs'>> = {}) {
    this.maxAttempts = opts.maxAttempts ?? 3;
    this.successDelayMs = opts.successDelayMs ?? 30_000;
    this.failureDelayMs = opts.failureDelayMs ?? 60_000;
    this.retryDelayMs = opts.retryDelayMs ?? 120_000;

    if (this.maxAttempts < 1) {
      throw new Error(`maxAttempts must be at least 1 (got ${this.maxAttempts})`);
    }
  }

  delayAfter(succeeded: boolean, pass: PassKind): number {
    if (pass === 'retry') return this.retryDelayMs;
    return succeeded ? this.successDelayMs : this.failureDelayMs;
  }
}
