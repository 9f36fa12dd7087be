import type { ConfigStore } from '../config_store';
import type { RosterConfig } from '../../config_manager/config_manager.types';

/**
 * MemoryConfigStore - In-memory ConfigStore for tests
 */
export class MemoryConfigStore implements ConfigStore {
  private config: RosterConfig | null = null;

  async loadConfig(): Promise<RosterConfig | null> {
    return this.config ? { ...this.config } : null;
  }

  // ─────────────────────────────────────────────────────────
  // Test Helpers
  // ─────────────────────────────────────────────────────────

  setConfig(config: RosterConfig | null): void {
    this.config = config ? { ...config } : null;
  }
}
