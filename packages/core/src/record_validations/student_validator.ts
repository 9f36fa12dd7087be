import type { ErrorObject } from 'ajv';
import type { StudentRecord } from '../record_types';
import type { FieldError, ValidationResult } from '../types/common.types';
import { SchemaValidationCache } from '../record_schemas/schema_cache';

function toFieldError(error: ErrorObject): FieldError {
  const missing: unknown = error.params['missingProperty'];
  const extra: unknown = error.params['additionalProperty'];
  const field = error.instancePath.replace(/^\//, '')
    || (typeof missing === 'string' ? missing : '')
    || (typeof extra === 'string' ? extra : '')
    || 'root';

  return {
    field,
    message: error.message ?? 'Unknown validation error',
    value: error.data,
  };
}

/**
 * Type guard to check if data is a valid StudentRecord
 */
export function isStudentRecord(data: unknown): data is StudentRecord {
  return SchemaValidationCache.getStudentRecordValidator()(data);
}

/**
 * Detailed validation with field-level error reporting
 */
export function validateStudentRecordDetailed(data: unknown): ValidationResult {
  const validator = SchemaValidationCache.getStudentRecordValidator();

  if (!validator(data)) {
    return {
      isValid: false,
      errors: (validator.errors ?? []).map(toFieldError),
    };
  }

  return { isValid: true, errors: [] };
}
