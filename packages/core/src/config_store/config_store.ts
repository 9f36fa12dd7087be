/**
 * ConfigStore Interface
 *
 * Abstraction for configuration loading, so ConfigManager works the same
 * against the process environment or an in-memory fixture.
 */

import type { RosterConfig } from '../config_manager/config_manager.types';

export interface ConfigStore {
  /**
   * Load configuration
   *
   * @returns RosterConfig or null if the backend holds none
   */
  loadConfig(): Promise<RosterConfig | null>;
}
