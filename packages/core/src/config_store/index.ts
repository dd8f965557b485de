/**
 * Interface only. Implementations live behind the entry points:
 * - @metablock/core/fs for FsConfigStore and createConfigManager
 * - @metablock/core/memory for MemoryConfigStore
 */
export type { ConfigStore } from './config_store';
