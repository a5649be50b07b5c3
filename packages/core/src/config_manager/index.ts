export { ConfigManager } from './config_manager';
export * from './config_manager.types';
