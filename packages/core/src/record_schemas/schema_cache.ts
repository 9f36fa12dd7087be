import Ajv from 'ajv';
import type { ValidateFunction } from 'ajv';
import type { StudentRecord } from '../record_types';
import { StudentRecordSchema } from './student_record_schema';

/**
 * Singleton cache for schema validators to avoid repeated AJV compilation.
 */
export class SchemaValidationCache {
  private static ajv: Ajv | null = null;
  private static studentRecordValidator: ValidateFunction<StudentRecord> | null = null;

  /**
   * Shared AJV instance. `verbose` keeps the offending value on each error.
   */
  static getAjv(): Ajv {
    if (!this.ajv) {
      this.ajv = new Ajv({ allErrors: true, verbose: true });
    }
    return this.ajv;
  }

  static getStudentRecordValidator(): ValidateFunction<StudentRecord> {
    if (!this.studentRecordValidator) {
      this.studentRecordValidator = this.getAjv().compile(StudentRecordSchema);
    }
    return this.studentRecordValidator;
  }
}
