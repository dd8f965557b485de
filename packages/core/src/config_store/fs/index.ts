export { FsConfigStore, createConfigManager, CONFIG_FILENAME } from './fs_config_store';
