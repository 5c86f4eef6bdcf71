export interface RecordedEntry {
  at: string;
  message: string;
  meta?: unknown;
}

/** Newest-first ring of recent lines. */
export class RecentLog {
  private readonly entries: RecordedEntry[] = [];

  constructor(private readonly limit: number, private readonly clock: () => Date = () => new Date()) {}

  push(message: string, meta?: unknown): void {
    this.entries.unshift({ at: this.clock().toISOString(), message, meta });
    if (this.entries.length > this.limit) {
      this.entries.length = this.limit;
    }
  }

  list(): RecordedEntry[] {
    return [...this.entries];
  }

  get size(): number {
    return this.entries.length;
  }
}
