import type { LogLevel } from '../logger';

/**
 * Effective scheduler settings after merging every source.
 */
export type SchedulerConfig = {
  /** Maximum number of tasks running at once */
  poolSize: number;
  /** Milliseconds per simulated duration unit */
  timeUnitMs: number;
  logLevel: LogLevel;
};

/**
 * Contents of a project config file. Every field is optional.
 */
export type SchedulerConfigFile = Partial<SchedulerConfig>;

export const DEFAULT_SCHEDULER_CONFIG: SchedulerConfig = {
  poolSize: 5,
  timeUnitMs: 1000,
  logLevel: 'info',
};

/**
 * Environment variables read by the ConfigManager.
 */
export const CONFIG_ENV_VARS = {
  poolSize: 'TASKPOOL_POOL_SIZE',
  timeUnitMs: 'TASKPOOL_TIME_UNIT_MS',
  logLevel: 'LOG_LEVEL',
} as const;

export interface IConfigManager {
  loadSchedulerConfig(overrides?: SchedulerConfigFile): Promise<SchedulerConfig>;
}
