/**
 * StudentRecord - one student held by the record store.
 *
 * `id` is assigned by the caller and never changes after creation.
 */
export type StudentRecord = {
  id: number;
  name: string;
  age: number;
  major: string;
};

/**
 * Fields that may change after creation.
 */
export type StudentField = 'name' | 'age' | 'major';

/**
 * Selective update payload.
 *
 * A property that is absent means "not supplied" and leaves the stored value
 * alone. A present property always overwrites, so `name: ''` and `age: 0`
 * are real values.
 */
export type StudentUpdate = {
  name?: string;
  age?: number;
  major?: string;
};

/** Fields applied by an update, in the order they are checked. */
export const STUDENT_FIELDS: readonly StudentField[] = ['name', 'age', 'major'];
