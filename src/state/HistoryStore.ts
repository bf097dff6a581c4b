import type { HistoryEntry, IntervalKind } from '../shared/types';

const MAX_ENTRIES = 500;

/** Completed intervals of the current process; nothing is written to disk */
export class HistoryStore {
  private _entries: HistoryEntry[] = [];

  log(entry: Omit<HistoryEntry, 'id'>): HistoryEntry {
    const newEntry: HistoryEntry = {
      ...entry,
      id: crypto.randomUUID(),
    };
    this._entries.push(newEntry);
    // FIFO eviction
    if (this._entries.length > MAX_ENTRIES) {
      this._entries = this._entries.slice(-MAX_ENTRIES);
    }
    return newEntry;
  }

  getAll(): HistoryEntry[] {
    return [...this._entries];
  }

  getByKind(kind: IntervalKind): HistoryEntry[] {
    return this._entries.filter(e => e.kind === kind);
  }

  focusSecondsTotal(): number {
    return this.getByKind('focus').reduce((sum, e) => sum + e.durationSeconds, 0);
  }

  clear(): void {
    this._entries = [];
  }
}
