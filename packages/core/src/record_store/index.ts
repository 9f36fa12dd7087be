// Core interfaces - backend-agnostic
export type { RecordStore } from './record_store';
export type { StudentStore } from './record_store.types';

// NOTE: Implementations are exported via the Memory namespace:
// - Memory.MemoryRecordStore
