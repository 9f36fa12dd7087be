import { Adapters, Config, Logger, Memory } from '@roster/core';
import type { ConfigStore, Records, Store } from '@roster/core';

export interface DependencyInjectionOptions {
  configStore: ConfigStore.ConfigStore;
}

/**
 * Dependency Injection Service for Roster CLI
 *
 * Creates and caches the configuration, logger, store and facade for one
 * CLI run. Built by the entry point and handed to commands; separate
 * instances never share a store.
 */
export class DependencyInjectionService {
  private readonly configManager: Config.ConfigManager;
  private config: Config.ResolvedRosterConfig | null = null;
  private logger: Logger.Logger | null = null;
  private studentStore: Store.StudentStore | null = null;
  private studentAdapter: Adapters.IStudentAdapter | null = null;

  constructor(options: DependencyInjectionOptions) {
    this.configManager = new Config.ConfigManager(options.configStore);
  }

  /**
   * Resolved configuration, loaded once
   */
  async getConfig(): Promise<Config.ResolvedRosterConfig> {
    if (!this.config) {
      this.config = await this.configManager.resolveConfig();
    }
    return this.config;
  }

  /**
   * Shared logger; commands adjust its level from their flags
   */
  async getLogger(): Promise<Logger.Logger> {
    if (!this.logger) {
      const config = await this.getConfig();
      this.logger = Logger.createLogger('[roster] ', config.logLevel);
    }
    return this.logger;
  }

  /**
   * In-memory student store, honouring the cloneRecords setting
   */
  async getStudentStore(): Promise<Store.StudentStore> {
    if (!this.studentStore) {
      const config = await this.getConfig();
      this.studentStore = new Memory.MemoryRecordStore<number, Records.StudentRecord>({
        deepClone: config.cloneRecords,
      });
    }
    return this.studentStore;
  }

  /**
   * Creates and returns StudentAdapter with all required dependencies
   */
  async getStudentAdapter(): Promise<Adapters.IStudentAdapter> {
    if (!this.studentAdapter) {
      this.studentAdapter = new Adapters.StudentAdapter({
        studentStore: await this.getStudentStore(),
        logger: await this.getLogger(),
      });
    }
    return this.studentAdapter;
  }
}
