/**
 * MemoryConfigStore - In-memory implementation of ConfigStore
 */

import type { ConfigStore } from '../config_store';
import type { MetablockConfig } from '../../config_manager';

/**
 * In-memory ConfigStore for tests.
 *
 * @example
 * ```typescript
 * const configStore = new MemoryConfigStore();
 * configStore.setConfig({ threshold: 2 });
 * const manager = new ConfigManager(configStore);
 * ```
 */
export class MemoryConfigStore implements ConfigStore {
  private config: MetablockConfig | null = null;

  async loadConfig(): Promise<MetablockConfig | null> {
    return this.config;
  }

  async saveConfig(config: MetablockConfig): Promise<void> {
    this.config = config;
  }

  // ==================== Test Helper Methods ====================

  /**
   * Set configuration directly (null clears it)
   */
  setConfig(config: MetablockConfig | null): void {
    this.config = config;
  }

  getConfig(): MetablockConfig | null {
    return this.config;
  }

  clear(): void {
    this.config = null;
  }
}
