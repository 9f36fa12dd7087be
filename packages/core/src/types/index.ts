export { RosterError } from './common.types';
export type { FieldError, ValidationResult } from './common.types';
