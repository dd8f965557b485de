/**
 * ConfigManager Types
 */

import type { LogLevel } from '../logger';

/**
 * Contents of metablock.config.json. Every field is optional.
 */
export type MetablockConfig = {
  threshold?: number;
  keysDir?: string;
  metadataDir?: string;
  logLevel?: LogLevel;
};

export type ResolvedConfig = Required<MetablockConfig>;

export const DEFAULT_CONFIG: Readonly<ResolvedConfig> = Object.freeze({
  threshold: 1,
  keysDir: 'keys',
  metadataDir: 'metadata',
  logLevel: 'info',
});

export interface IConfigManager {
  loadConfig(): Promise<MetablockConfig | null>;
  getResolvedConfig(): Promise<ResolvedConfig>;
  getThreshold(): Promise<number>;
  getKeysDir(): Promise<string>;
  getMetadataDir(): Promise<string>;
  getLogLevel(): Promise<LogLevel>;
  updateConfig(update: Partial<MetablockConfig>): Promise<void>;
}
