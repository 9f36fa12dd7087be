/**
 * RecordStore<K, V> - Generic interface for record ownership and lookup
 *
 * Abstracts CRUD operations without assuming a storage backend.
 * Every operation runs to completion before returning; there is no I/O.
 * Absence is a normal `null` return, never an error.
 *
 * @typeParam K - Identifier type, compared by natural equality
 * @typeParam V - Value type (the record being stored)
 */
export interface RecordStore<K, V> {
  /**
   * Gets a record by ID
   * @returns The record or null if it doesn't exist
   */
  get(id: K): V | null;

  /**
   * Inserts or overwrites the record at the given ID.
   * Uniqueness is the caller's concern.
   */
  put(id: K, value: V): void;

  /**
   * Persists multiple records, in order.
   */
  putMany(entries: Array<{ id: K; value: V }>): void;

  /**
   * Deletes a record
   * @returns The removed record, or null if there was nothing to remove
   */
  remove(id: K): V | null;

  /**
   * Lists every stored record. Order is not part of the contract.
   */
  listAll(): V[];

  /**
   * Checks if a record exists
   */
  exists(id: K): boolean;
}
