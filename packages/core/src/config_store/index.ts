export type { ConfigStore } from './config_store';
export { FsConfigStore, CONFIG_FILE_NAMES } from './fs';
export { MemoryConfigStore } from './memory';
