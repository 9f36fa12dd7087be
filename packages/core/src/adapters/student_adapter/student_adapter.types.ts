import type { StudentStore } from '../../record_store';
import type { StudentField, StudentRecord, StudentUpdate } from '../../record_types';
import type { Logger } from '../../logger';

/**
 * StudentAdapter Dependencies - Facade + Dependency Injection Pattern
 */
export interface StudentAdapterDependencies {
  // Data Layer
  studentStore: StudentStore;

  // Infrastructure Layer (optional, defaults to a prefixed console logger)
  logger?: Logger;
}

/**
 * Outcome of a mutating operation. Expected failures are values, not errors.
 */
export type StudentOutcome =
  | { status: 'added'; student: StudentRecord }
  | { status: 'already_exists'; id: number }
  | { status: 'removed'; student: StudentRecord }
  | { status: 'not_found'; id: number }
  | { status: 'updated'; student: StudentRecord; changedFields: StudentField[] };

/**
 * Result of listing. `empty` is the distinguished "no records" indicator.
 */
export type StudentListing =
  | { status: 'empty' }
  | { status: 'listed'; students: StudentRecord[]; lines: string[] };

/**
 * StudentAdapter Interface - The Roster Facade
 */
export interface IStudentAdapter {
  /**
   * Adds a new student unless the id is taken.
   */
  addStudent(payload: StudentRecord): StudentOutcome;

  /**
   * Removes a student by id.
   */
  deleteStudent(id: number): StudentOutcome;

  /**
   * Overwrites the supplied fields of an existing student.
   */
  updateStudent(id: number, changes: StudentUpdate): StudentOutcome;

  /**
   * Lists every student, rendered for display.
   */
  listStudents(): StudentListing;

  /**
   * Gets a specific student by id.
   */
  getStudent(id: number): StudentRecord | null;
}
