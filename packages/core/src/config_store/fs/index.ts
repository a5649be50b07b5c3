export { FsConfigStore, CONFIG_FILE_NAMES } from './fs_config_store';
