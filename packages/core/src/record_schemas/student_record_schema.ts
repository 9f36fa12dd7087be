import type { JSONSchemaType } from 'ajv';
import type { StudentRecord } from '../record_types';

/**
 * JSON Schema for StudentRecord.
 * Checks primitive types only; business rules live in StudentAdapter.
 */
export const StudentRecordSchema: JSONSchemaType<StudentRecord> = {
  $id: 'student_record_schema.json',
  type: 'object',
  properties: {
    id: { type: 'integer' },
    name: { type: 'string' },
    age: { type: 'integer' },
    major: { type: 'string' },
  },
  required: ['id', 'name', 'age', 'major'],
  additionalProperties: false,
};
