export type { StudentRecord, StudentField, StudentUpdate } from './student_record.types';
export { STUDENT_FIELDS } from './student_record.types';
