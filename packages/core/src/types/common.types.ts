/**
 * Base class for all Roster-specific errors.
 * Centralized here as it's used across modules (schemas, validation, config).
 */
export class RosterError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * A single field-level failure reported by a validator.
 */
export type FieldError = {
  field: string;
  message: string;
  value: unknown;
};

/**
 * Standard validation result shared by every validateXDetailed function.
 */
export interface ValidationResult {
  isValid: boolean;
  errors: FieldError[];
}
