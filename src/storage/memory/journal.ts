/**
 * Records how to reverse each write made during a unit of work
 */
export class UndoJournal {
  private entries: Array<() => void> | null = null;

  begin(): void {
    this.entries = [];
  }

  record(undo: () => void): void {
    this.entries?.push(undo);
  }

  commit(): void {
    this.entries = null;
  }

  rollback(): void {
    const entries = this.entries ?? [];
    this.entries = null;
    for (const undo of entries.reverse()) {
      undo();
    }
  }
}

/**
 * Map whose writes are undone when the enclosing unit of work rolls back
 */
export class JournaledMap<K, V> {
  private readonly entries = new Map<K, V>();

  constructor(private readonly journal: UndoJournal) {}

  get(key: K): V | undefined {
    return this.entries.get(key);
  }

  has(key: K): boolean {
    return this.entries.has(key);
  }

  values(): V[] {
    return [...this.entries.values()];
  }

  set(key: K, value: V): void {
    const previous = this.entries.get(key);
    this.entries.set(key, value);
    this.journal.record(() => {
      if (previous === undefined) {
        this.entries.delete(key);
      } else {
        this.entries.set(key, previous);
      }
    });
  }

  delete(key: K): boolean {
    const previous = this.entries.get(key);
    if (previous === undefined) {
      return false;
    }
    this.entries.delete(key);
    this.journal.record(() => {
      this.entries.set(key, previous);
    });
    return true;
  }
}
