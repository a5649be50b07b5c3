/**
 * ConfigStore Interface
 *
 * Abstraction over where project scheduler settings live, so the
 * ConfigManager can read them from disk or, in tests, from memory.
 *
 * Implementations:
 * - FsConfigStore: taskpool.config.{yaml,yml,json} in a project directory
 * - MemoryConfigStore: In-memory for tests
 */

import type { SchedulerConfigFile } from '../config_manager/config_manager.types';

export interface ConfigStore {
  /**
   * @returns the stored settings, or null when there are none
   */
  loadConfig(): Promise<SchedulerConfigFile | null>;
}
