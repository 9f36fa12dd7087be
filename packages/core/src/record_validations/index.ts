export { isStudentRecord, validateStudentRecordDetailed } from './student_validator';
export { DetailedValidationError } from '../record_schemas/errors';
export type { ValidationResult, FieldError } from '../types/common.types';
