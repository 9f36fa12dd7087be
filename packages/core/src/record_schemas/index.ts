export { StudentRecordSchema } from './student_record_schema';
export { SchemaValidationCache } from './schema_cache';
export { DetailedValidationError } from './errors';
