/**
 * ConfigManager - Scheduler Configuration
 *
 * Merges scheduler settings from, highest priority first:
 * 1. Explicit overrides (CLI flags, constructor options)
 * 2. Environment variables (TASKPOOL_POOL_SIZE, TASKPOOL_TIME_UNIT_MS, LOG_LEVEL)
 * 3. The project config file, through a ConfigStore
 * 4. Defaults
 */

import { ConfigurationError } from '../errors';
import { isLogLevel } from '../logger';
import { Schemas } from '../schemas';
import { assertValid } from '../validation';
import type { ConfigStore } from '../config_store/config_store';
import {
  CONFIG_ENV_VARS,
  DEFAULT_SCHEDULER_CONFIG
} from './config_manager.types';
import type {
  IConfigManager,
  SchedulerConfig,
  SchedulerConfigFile
} from './config_manager.types';

type Environment = Record<string, string | undefined>;

/**
 * @example
 * ```typescript
 * // Production usage
 * const configManager = new ConfigManager(new FsConfigStore(process.cwd()));
 * const config = await configManager.loadSchedulerConfig({ poolSize: 2 });
 *
 * // Test usage
 * const store = new MemoryConfigStore();
 * store.setConfig({ poolSize: 3 });
 * const configManager = new ConfigManager(store, {});
 * ```
 */
export class ConfigManager implements IConfigManager {
  private readonly configStore: ConfigStore | null;
  private readonly env: Environment;

  constructor(configStore: ConfigStore | null = null, env: Environment = process.env) {
    this.configStore = configStore;
    this.env = env;
  }

  /**
   * @throws ConfigurationError if a numeric environment variable is not a number
   * @throws DetailedValidationError if the merged settings are out of range
   */
  async loadSchedulerConfig(overrides: SchedulerConfigFile = {}): Promise<SchedulerConfig> {
    const fileConfig = (await this.configStore?.loadConfig()) ?? {};
    const envConfig = this.readEnvironment();

    const config: SchedulerConfig = {
      poolSize: overrides.poolSize
        ?? envConfig.poolSize
        ?? fileConfig.poolSize
        ?? DEFAULT_SCHEDULER_CONFIG.poolSize,
      timeUnitMs: overrides.timeUnitMs
        ?? envConfig.timeUnitMs
        ?? fileConfig.timeUnitMs
        ?? DEFAULT_SCHEDULER_CONFIG.timeUnitMs,
      logLevel: overrides.logLevel
        ?? envConfig.logLevel
        ?? fileConfig.logLevel
        ?? DEFAULT_SCHEDULER_CONFIG.logLevel,
    };

    assertValid('SchedulerConfig', Schemas.SchedulerConfig, config);
    return config;
  }

  private readEnvironment(): SchedulerConfigFile {
    const logLevel = this.env[CONFIG_ENV_VARS.logLevel];
    const poolSize = this.readNumber(CONFIG_ENV_VARS.poolSize);
    const timeUnitMs = this.readNumber(CONFIG_ENV_VARS.timeUnitMs);

    return {
      ...(poolSize !== undefined && { poolSize }),
      ...(timeUnitMs !== undefined && { timeUnitMs }),
      // Unknown levels are ignored, as the logger does
      ...(isLogLevel(logLevel) && { logLevel }),
    };
  }

  private readNumber(name: string): number | undefined {
    const raw = this.env[name];
    if (raw === undefined || raw.trim() === '') {
      return undefined;
    }
    const value = Number(raw);
    if (!Number.isFinite(value)) {
      throw new ConfigurationError(`${name} must be a number, got "${raw}"`);
    }
    return value;
  }
}
