/**
 * FsConfigStore - Filesystem implementation of ConfigStore
 *
 * Persists metablock.config.json in the project root, and locates that root.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { existsSync } from 'fs';
import type { ConfigStore } from '../config_store';
import { ConfigManager } from '../../config_manager';
import type { MetablockConfig } from '../../config_manager';
import { createLogger } from '../../logger';
import { Schemas } from '../../schemas';
import { SchemaValidationCache, formatSchemaErrors } from '../../schemas/schema_cache';

export const CONFIG_FILENAME = 'metablock.config.json';

const logger = createLogger('[Config] ');
const getConfigValidator = SchemaValidationCache.validatorFor<MetablockConfig>(Schemas.MetablockConfig);

// Project root cache
let projectRootCache: string | null = null;
let lastSearchPath: string | null = null;

/**
 * A file that cannot be read or validated loads as null.
 *
 * @example
 * ```typescript
 * const store = new FsConfigStore('/path/to/project');
 * const config = await store.loadConfig();
 * ```
 */
export class FsConfigStore implements ConfigStore {
  private readonly configPath: string;

  constructor(projectRootPath: string) {
    this.configPath = path.join(projectRootPath, CONFIG_FILENAME);
  }

  async loadConfig(): Promise<MetablockConfig | null> {
    let content: string;
    try {
      content = await fs.readFile(this.configPath, 'utf-8');
    } catch {
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      logger.warn(`Ignoring ${this.configPath}: ${error instanceof Error ? error.message : String(error)}`);
      return null;
    }

    const validator = getConfigValidator();
    if (!validator(parsed)) {
      const fields = formatSchemaErrors(validator.errors).map(e => `${e.field || '/'} ${e.message}`);
      logger.warn(`Ignoring ${this.configPath}: ${fields.join('; ')}`);
      return null;
    }
    return parsed;
  }

  async saveConfig(config: MetablockConfig): Promise<void> {
    await fs.writeFile(this.configPath, JSON.stringify(config, null, 2), 'utf-8');
  }

  /**
   * Searches upwards for the directory holding metablock.config.json.
   * Caches the result per start path.
   *
   * @returns Absolute path to project root, or null if not found
   */
  static findProjectRoot(startPath: string = process.cwd()): string | null {
    if (lastSearchPath === startPath && projectRootCache) {
      return projectRootCache;
    }
    projectRootCache = null;
    lastSearchPath = startPath;

    let currentPath = startPath;
    while (true) {
      if (existsSync(path.join(currentPath, CONFIG_FILENAME))) {
        projectRootCache = currentPath;
        return projectRootCache;
      }
      const parent = path.dirname(currentPath);
      if (parent === currentPath) {
        return null;
      }
      currentPath = parent;
    }
  }

  static resetCache(): void {
    projectRootCache = null;
    lastSearchPath = null;
  }
}

/**
 * ConfigManager on the filesystem store. Auto-detects the project root when
 * none is given, falling back to the working directory.
 */
export function createConfigManager(projectRoot?: string): ConfigManager {
  const resolvedRoot = projectRoot || FsConfigStore.findProjectRoot() || process.cwd();
  return new ConfigManager(new FsConfigStore(resolvedRoot));
}
