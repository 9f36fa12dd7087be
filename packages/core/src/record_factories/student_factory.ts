import type { StudentRecord } from '../record_types';
import { validateStudentRecordDetailed } from '../record_validations/student_validator';
import { DetailedValidationError } from '../record_schemas/errors';

/**
 * Creates a complete StudentRecord with validation
 *
 * Only the four known fields are copied, so callers cannot smuggle extra
 * properties into the store.
 *
 * @throws DetailedValidationError when a field has the wrong primitive type
 */
export function createStudentRecord(payload: StudentRecord): StudentRecord {
  const student: StudentRecord = {
    id: payload.id,
    name: payload.name,
    age: payload.age,
    major: payload.major,
  };

  const validation = validateStudentRecordDetailed(student);
  if (!validation.isValid) {
    throw new DetailedValidationError('StudentRecord', validation.errors);
  }

  return student;
}
