import type { AppendLog } from './types.js';

/**
 * Process-local append log. Several CallLedger instances may share one to
 * stand in for separate writer processes.
 */
export class InMemoryAppendLog<T> implements AppendLog<T> {
  private entries: T[] = [];
  private timestampOf: (entry: T) => number;
  private retentionMs: number;

  constructor(timestampOf: (entry: T) => number, retentionMs: number = Number.POSITIVE_INFINITY) {
    this.timestampOf = timestampOf;
    this.retentionMs = retentionMs;
  }

  async append(entry: T): Promise<void> {
    this.entries.push(entry);

    const cutoff = Date.now() - this.retentionMs;
    if (Number.isFinite(cutoff)) {
      this.entries = this.entries.filter((e) => this.timestampOf(e) >= cutoff);
    }
  }

  async scanSince(sinceMs: number): Promise<T[]> {
    return this.entries
      .filter((entry) => this.timestampOf(entry) >= sinceMs)
      .sort((a, b) => this.timestampOf(a) - this.timestampOf(b));
  }

  size(): number {
    return this.entries.length;
  }

  clear(): void {
    this.entries = [];
  }
}
