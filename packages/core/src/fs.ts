/**
 * Filesystem-dependent implementations.
 * Use @metablock/core/memory for in-memory alternatives.
 */

export { FsConfigStore, createConfigManager, CONFIG_FILENAME } from './config_store/fs';
