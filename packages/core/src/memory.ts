/**
 * In-memory implementations
 *
 * Everything here works without filesystem or environment access.
 */

// Store
export { MemoryRecordStore } from './record_store/memory';
export type { MemoryRecordStoreOptions } from './record_store/memory';

// ConfigStore
export { MemoryConfigStore } from './config_store/memory';
