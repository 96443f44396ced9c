export class Stopwatch {
  private start: bigint = process.hrtime.bigint();

  restart(): void {
    this.start = process.hrtime.bigint();
  }

  elapsedMs(): number {
    return Number((process.hrtime.bigint() - this.start) / 1_000_000n);
  }
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const seconds = Math.round(ms / 1000);
  if (seconds < 60) return `${seconds}s`;
  const minutes = Math.floor(seconds / 60);
  const rest = seconds % 60;
  return rest === 0 ? `${minutes}m` : `${minutes}m${rest}s`;
}
