import { createStudentRecord } from '../../record_factories/student_factory';
import { STUDENT_FIELDS } from '../../record_types';
import { createLogger } from '../../logger';
import type { Logger } from '../../logger';
import type { StudentStore } from '../../record_store';
import type { StudentField, StudentRecord, StudentUpdate } from '../../record_types';
import type {
  IStudentAdapter,
  StudentAdapterDependencies,
  StudentListing,
  StudentOutcome,
} from './student_adapter.types';

export const NO_STUDENTS_MESSAGE = 'No students found.';

/**
 * Renders one student as a single display line.
 */
export function renderStudent(student: StudentRecord): string {
  return `ID: ${student.id}, Name: ${student.name}, Age: ${student.age}, Major: ${student.major}`;
}

/**
 * Human-readable message for an outcome.
 */
export function describeOutcome(outcome: StudentOutcome): string {
  switch (outcome.status) {
    case 'added':
      return `Student ${outcome.student.id} added.`;
    case 'already_exists':
      return `Student with ID ${outcome.id} already exists.`;
    case 'removed':
      return `Student ${outcome.student.id} removed.`;
    case 'not_found':
      return `Student with ID ${outcome.id} not found.`;
    case 'updated':
      return `Student ${outcome.student.id} updated.`;
  }
}

/**
 * Display lines for a listing.
 */
export function describeListing(listing: StudentListing): string[] {
  return listing.status === 'empty' ? [NO_STUDENTS_MESSAGE] : listing.lines;
}

/**
 * StudentAdapter - The Roster Facade
 *
 * Implements Facade + Dependency Injection Pattern. The only component that
 * knows the business rules: ids are unique on add and must exist on update
 * and delete. Every operation is a single synchronous call into the store.
 */
export class StudentAdapter implements IStudentAdapter {
  private studentStore: StudentStore;
  private logger: Logger;

  constructor(dependencies: StudentAdapterDependencies) {
    this.studentStore = dependencies.studentStore;
    this.logger = dependencies.logger ?? createLogger('[StudentAdapter] ');
  }

  addStudent(payload: StudentRecord): StudentOutcome {
    if (this.studentStore.exists(payload.id)) {
      this.logger.debug(`add rejected, id ${payload.id} already exists`);
      return { status: 'already_exists', id: payload.id };
    }

    const student = createStudentRecord(payload);
    this.studentStore.put(student.id, student);
    this.logger.debug(`added student ${student.id}`);

    return { status: 'added', student };
  }

  deleteStudent(id: number): StudentOutcome {
    const removed = this.studentStore.remove(id);
    if (!removed) {
      this.logger.debug(`delete skipped, id ${id} not found`);
      return { status: 'not_found', id };
    }

    this.logger.debug(`removed student ${id}`);
    return { status: 'removed', student: removed };
  }

  /**
   * A field counts as supplied when its property is present; empty strings
   * and zero overwrite like any other value.
   */
  updateStudent(id: number, changes: StudentUpdate): StudentOutcome {
    const existing = this.studentStore.get(id);
    if (!existing) {
      this.logger.debug(`update skipped, id ${id} not found`);
      return { status: 'not_found', id };
    }

    const changedFields: StudentField[] = STUDENT_FIELDS.filter(field => changes[field] !== undefined);
    const student = createStudentRecord({
      id: existing.id,
      name: changes.name ?? existing.name,
      age: changes.age ?? existing.age,
      major: changes.major ?? existing.major,
    });

    this.studentStore.put(id, student);
    this.logger.debug(`updated student ${id}`, { changedFields });

    return { status: 'updated', student, changedFields };
  }

  listStudents(): StudentListing {
    const students = this.studentStore.listAll();
    if (students.length === 0) {
      return { status: 'empty' };
    }

    return {
      status: 'listed',
      students,
      lines: students.map(renderStudent),
    };
  }

  getStudent(id: number): StudentRecord | null {
    return this.studentStore.get(id);
  }
}
