import { RosterError } from '../types/common.types';

/**
 * Error for configuration values that cannot be interpreted.
 */
export class ConfigurationError extends RosterError {
  constructor(key: string, value: string, expected: string) {
    super(`Invalid value "${value}" for ${key}: expected ${expected}`, 'CONFIGURATION_ERROR');
  }
}
