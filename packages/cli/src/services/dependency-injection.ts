import * as path from 'path';
import type { Config } from '@metablock/core';
import { FsConfigStore, createConfigManager } from '@metablock/core/fs';

/**
 * Dependency Injection Service for the Metablock CLI
 *
 * Resolves the project root once and hands out the managers built on it.
 */
export class DependencyInjectionService {
  private static instance: DependencyInjectionService | null = null;
  private configManager: Config.ConfigManager | null = null;
  private projectRoot: string | null = null;

  private constructor() { }

  static getInstance(): DependencyInjectionService {
    if (!DependencyInjectionService.instance) {
      DependencyInjectionService.instance = new DependencyInjectionService();
    }
    return DependencyInjectionService.instance;
  }

  /**
   * Drops the singleton (for tests).
   */
  static reset(): void {
    DependencyInjectionService.instance = null;
  }

  /**
   * Nearest directory holding metablock.config.json, else the working directory.
   */
  getProjectRoot(): string {
    if (!this.projectRoot) {
      this.projectRoot = FsConfigStore.findProjectRoot() || process.cwd();
    }
    return this.projectRoot;
  }

  async getConfigManager(): Promise<Config.ConfigManager> {
    if (!this.configManager) {
      this.configManager = createConfigManager(this.getProjectRoot());
    }
    return this.configManager;
  }

  /**
   * Resolves a configured directory (keysDir, metadataDir) against the project root.
   */
  resolveProjectPath(relativePath: string): string {
    return path.resolve(this.getProjectRoot(), relativePath);
  }
}
