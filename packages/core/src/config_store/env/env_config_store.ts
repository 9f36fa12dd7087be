import type { ConfigStore } from '../config_store';
import type { RosterConfig } from '../../config_manager/config_manager.types';
import { ConfigurationError } from '../../config_manager/errors';
import { isLogLevel, LOG_LEVELS } from '../../logger';

export type EnvMap = Record<string, string | undefined>;

export const ENV_KEYS = {
  logLevel: 'ROSTER_LOG_LEVEL',
  cloneRecords: 'ROSTER_CLONE_RECORDS',
} as const;

function parseBoolean(key: string, raw: string): boolean {
  const value = raw.trim().toLowerCase();
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  throw new ConfigurationError(key, raw, 'true, false, 1 or 0');
}

/**
 * EnvConfigStore - reads ROSTER_* variables from an environment map
 *
 * Unset or empty variables are left out so ConfigManager applies its defaults.
 * Returns null when no ROSTER_* variable is set.
 *
 * @throws ConfigurationError when a variable holds an unrecognised value
 */
export class EnvConfigStore implements ConfigStore {
  constructor(private readonly env: EnvMap) { }

  async loadConfig(): Promise<RosterConfig | null> {
    const config: RosterConfig = {};

    const logLevel = this.env[ENV_KEYS.logLevel]?.trim();
    if (logLevel) {
      if (!isLogLevel(logLevel)) {
        throw new ConfigurationError(ENV_KEYS.logLevel, logLevel, LOG_LEVELS.join(', '));
      }
      config.logLevel = logLevel;
    }

    const cloneRecords = this.env[ENV_KEYS.cloneRecords];
    if (cloneRecords?.trim()) {
      config.cloneRecords = parseBoolean(ENV_KEYS.cloneRecords, cloneRecords);
    }

    return Object.keys(config).length > 0 ? config : null;
  }
}
