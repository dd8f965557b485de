export { ConfigManager } from './config_manager';
export { DEFAULT_CONFIG } from './config_manager.types';
export type { IConfigManager, MetablockConfig, ResolvedConfig } from './config_manager.types';
