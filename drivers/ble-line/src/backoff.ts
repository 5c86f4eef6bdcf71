/**
 * Maps a reconnect attempt index to the delay before it. Past the end of the
 * list the policy is exhausted and `delayFor` returns null.
 */
export class ReconnectPolicy {
  private readonly delaysMs: readonly number[];

  constructor(delaysMs: readonly number[]) {
    this.delaysMs = [...delaysMs];
  }

  static exponential(minMs: number, maxMs: number, attempts: number): ReconnectPolicy {
    const delays: number[] = [];
    let current = minMs;
    for (let i = 0; i < attempts; i += 1) {
      delays.push(current);
      current = Math.min(maxMs, Math.max(minMs, current * 2));
    }
    return new ReconnectPolicy(delays);
  }

  get maxAttempts(): number {
    return this.delaysMs.length;
  }

  delayFor(attempt: number): number | null {
    if (!Number.isInteger(attempt) || attempt < 0) return null;
    return this.delaysMs[attempt] ?? null;
  }

  delays(): number[] {
    return [...this.delaysMs];
  }
}
