/**
 * ConfigManager - Roster Configuration Manager
 *
 * Uses the ConfigStore abstraction for backend-agnostic loading.
 *
 * @example
 * ```typescript
 * // Production usage
 * const configManager = new ConfigManager(new EnvConfigStore(process.env));
 *
 * // Test usage
 * const configStore = new MemoryConfigStore();
 * configStore.setConfig({ logLevel: 'debug' });
 * const configManager = new ConfigManager(configStore);
 * ```
 */

import type { ConfigStore } from '../config_store/config_store';
import type { IConfigManager, RosterConfig, ResolvedRosterConfig } from './config_manager.types';

export const DEFAULT_CONFIG: ResolvedRosterConfig = {
  logLevel: 'info',
  cloneRecords: true,
};

export class ConfigManager implements IConfigManager {
  private readonly configStore: ConfigStore;

  constructor(configStore: ConfigStore) {
    this.configStore = configStore;
  }

  async loadConfig(): Promise<RosterConfig | null> {
    return this.configStore.loadConfig();
  }

  async resolveConfig(): Promise<ResolvedRosterConfig> {
    const config = await this.loadConfig();

    return {
      logLevel: config?.logLevel ?? DEFAULT_CONFIG.logLevel,
      cloneRecords: config?.cloneRecords ?? DEFAULT_CONFIG.cloneRecords,
    };
  }
}
