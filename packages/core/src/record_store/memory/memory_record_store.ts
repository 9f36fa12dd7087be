import type { RecordStore } from '../record_store';

/**
 * Options for MemoryRecordStore
 */
export interface MemoryRecordStoreOptions<K, V> {
  /** Initial data, copied into the store */
  initial?: Map<K, V>;

  /** Clone data on get/put/listAll and when seeding from `initial` (default: true) */
  deepClone?: boolean;
}

/**
 * MemoryRecordStore<K, V> - In-memory implementation of RecordStore<K, V>
 *
 * Backed by a Map keyed by the identifier. By default, clones values on the
 * way in and out so callers never hold a reference into the store; with
 * `deepClone: false` lookups return the stored objects themselves.
 *
 * @example
 * const store = new MemoryRecordStore<number, StudentRecord>();
 * store.put(1, { id: 1, name: 'Alice', age: 20, major: 'CS' });
 *
 * expect(store.exists(1)).toBe(true);
 * expect(store.size()).toBe(1);
 *
 * store.clear();
 */
export class MemoryRecordStore<K, V> implements RecordStore<K, V> {
  private readonly data: Map<K, V>;
  private readonly deepClone: boolean;

  constructor(options: MemoryRecordStoreOptions<K, V> = {}) {
    this.deepClone = options.deepClone ?? true;
    this.data = new Map(
      Array.from(options.initial ?? [], ([id, value]): [K, V] => [id, this.clone(value)])
    );
  }

  private clone(value: V): V {
    if (!this.deepClone) return value;
    return structuredClone(value);
  }

  get(id: K): V | null {
    const value = this.data.get(id);
    return value !== undefined ? this.clone(value) : null;
  }

  put(id: K, value: V): void {
    this.data.set(id, this.clone(value));
  }

  putMany(entries: Array<{ id: K; value: V }>): void {
    for (const { id, value } of entries) {
      this.put(id, value);
    }
  }

  remove(id: K): V | null {
    const value = this.data.get(id);
    if (value === undefined) return null;

    this.data.delete(id);
    return value;
  }

  listAll(): V[] {
    return Array.from(this.data.values(), value => this.clone(value));
  }

  exists(id: K): boolean {
    return this.data.has(id);
  }

  // ─────────────────────────────────────────────────────────
  // Test Helpers (not part of RecordStore<K, V>, only for tests)
  // ─────────────────────────────────────────────────────────

  /** Clears all records from the store */
  clear(): void {
    this.data.clear();
  }

  /** Returns the number of records */
  size(): number {
    return this.data.size;
  }
}
