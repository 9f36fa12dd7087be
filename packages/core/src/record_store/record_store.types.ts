import type { RecordStore } from './record_store';
import type { StudentRecord } from '../record_types';

/**
 * Store of students keyed by their integer identifier.
 */
export type StudentStore = RecordStore<number, StudentRecord>;
