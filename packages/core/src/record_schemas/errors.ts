/**
 * Schema-specific error types for Roster core.
 */

import { RosterError } from '../types/common.types';
import type { FieldError } from '../types/common.types';

/**
 * Error for detailed AJV validation failures with multiple field errors.
 */
export class DetailedValidationError extends RosterError {
  constructor(
    recordType: string,
    public readonly errors: FieldError[]
  ) {
    const errorSummary = errors
      .map(err => `${err.field}: ${err.message}`)
      .join(', ');

    super(
      `${recordType} validation failed: ${errorSummary}`,
      'DETAILED_VALIDATION_ERROR'
    );
  }
}
