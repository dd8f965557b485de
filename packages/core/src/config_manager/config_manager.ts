/**
 * ConfigManager - Project Configuration Manager
 *
 * Typed access to metablock.config.json with defaults applied.
 * Persistence goes through a ConfigStore.
 */

import type { ConfigStore } from '../config_store/config_store';
import type { LogLevel } from '../logger';
import { DEFAULT_CONFIG } from './config_manager.types';
import type { IConfigManager, MetablockConfig, ResolvedConfig } from './config_manager.types';

/**
 * @example
 * ```typescript
 * // Production usage
 * import { FsConfigStore } from '@metablock/core/fs';
 * const configManager = new ConfigManager(new FsConfigStore('/path/to/project'));
 *
 * // Test usage
 * import { MemoryConfigStore } from '@metablock/core/memory';
 * const configStore = new MemoryConfigStore();
 * configStore.setConfig({ threshold: 2 });
 * const configManager = new ConfigManager(configStore);
 * ```
 */
export class ConfigManager implements IConfigManager {
  private readonly configStore: ConfigStore;

  constructor(configStore: ConfigStore) {
    this.configStore = configStore;
  }

  async loadConfig(): Promise<MetablockConfig | null> {
    return this.configStore.loadConfig();
  }

  /**
   * Config with every missing field taken from DEFAULT_CONFIG.
   */
  async getResolvedConfig(): Promise<ResolvedConfig> {
    const config = await this.loadConfig();
    return {
      threshold: config?.threshold ?? DEFAULT_CONFIG.threshold,
      keysDir: config?.keysDir ?? DEFAULT_CONFIG.keysDir,
      metadataDir: config?.metadataDir ?? DEFAULT_CONFIG.metadataDir,
      logLevel: config?.logLevel ?? DEFAULT_CONFIG.logLevel,
    };
  }

  async getThreshold(): Promise<number> {
    return (await this.getResolvedConfig()).threshold;
  }

  async getKeysDir(): Promise<string> {
    return (await this.getResolvedConfig()).keysDir;
  }

  async getMetadataDir(): Promise<string> {
    return (await this.getResolvedConfig()).metadataDir;
  }

  async getLogLevel(): Promise<LogLevel> {
    return (await this.getResolvedConfig()).logLevel;
  }

  /**
   * Merges `update` into the stored config. Creates the file when absent.
   */
  async updateConfig(update: Partial<MetablockConfig>): Promise<void> {
    const config = await this.loadConfig();
    await this.configStore.saveConfig({ ...config, ...update });
  }
}
