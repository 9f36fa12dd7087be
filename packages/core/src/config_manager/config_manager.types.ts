/**
 * ConfigManager Types
 */

import type { LogLevel } from '../logger';

/**
 * Roster configuration as stored. Every field is optional; ConfigManager
 * fills in defaults.
 */
export type RosterConfig = {
  logLevel?: LogLevel;
  cloneRecords?: boolean;
};

/**
 * Configuration with every default applied.
 */
export type ResolvedRosterConfig = Required<RosterConfig>;

/**
 * IConfigManager interface
 *
 * Provides typed access to Roster configuration.
 */
export interface IConfigManager {
  /**
   * Load raw configuration, or null when the backend holds none
   */
  loadConfig(): Promise<RosterConfig | null>;

  /**
   * Load configuration with defaults applied
   */
  resolveConfig(): Promise<ResolvedRosterConfig>;
}
