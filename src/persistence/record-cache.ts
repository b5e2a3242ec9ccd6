/**
 * In-memory copy of one collection's documents, keyed by document id.
 *
 * The cache starts unloaded; the owning collection fills it on first read and
 * invalidates it when the backing file may have changed outside the process.
 */
export class RecordCache<T> {
  private entries: Map<string, T> | null = null;

  get isLoaded(): boolean {
    return this.entries !== null;
  }

  /** Replace the whole cache with freshly loaded records */
  fill(records: Iterable<[string, T]>): void {
    this.entries = new Map(records);
  }

  get(id: string): T | null {
    return this.entries?.get(id) ?? null;
  }

  set(id: string, record: T): void {
    if (!this.entries) {
      throw new Error('RecordCache.set called before the cache was filled');
    }
    this.entries.set(id, record);
  }

  values(): T[] {
    return this.entries ? [...this.entries.values()] : [];
  }

  /** Snapshot of all records as a plain object, for writing to disk */
  toObject(): Record<string, T> {
    return Object.fromEntries(this.entries ?? []);
  }

  invalidate(): void {
    this.entries = null;
  }
}
