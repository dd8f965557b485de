/**
 * ConfigStore Interface
 *
 * Abstraction for metablock.config.json persistence (filesystem, or memory for tests).
 */

import type { MetablockConfig } from '../config_manager/config_manager.types';

export interface ConfigStore {
  /**
   * @returns MetablockConfig or null if not found/invalid
   */
  loadConfig(): Promise<MetablockConfig | null>;

  saveConfig(config: MetablockConfig): Promise<void>;
}
