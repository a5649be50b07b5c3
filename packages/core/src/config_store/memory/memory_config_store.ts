import type { ConfigStore } from '../config_store';
import type { SchedulerConfigFile } from '../../config_manager/config_manager.types';

/**
 * In-memory ConfigStore for tests.
 */
export class MemoryConfigStore implements ConfigStore {
  private config: SchedulerConfigFile | null = null;

  async loadConfig(): Promise<SchedulerConfigFile | null> {
    return this.config;
  }

  // ==================== Test Helper Methods ====================

  setConfig(config: SchedulerConfigFile | null): void {
    this.config = config;
  }

  clear(): void {
    this.config = null;
  }
}
