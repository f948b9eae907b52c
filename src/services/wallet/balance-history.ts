import { BalanceHistoryEntry } from './types';

export class BalanceHistory {
  private readonly entries: BalanceHistoryEntry[] = [];

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Balance history capacity must be a positive integer, got ${capacity}`);
    }
  }

  add(entry: BalanceHistoryEntry): void {
    this.entries.push(entry);
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }
  }

  list(): BalanceHistoryEntry[] {
    return [...this.entries];
  }

  size(): number {
    return this.entries.length;
  }
}
