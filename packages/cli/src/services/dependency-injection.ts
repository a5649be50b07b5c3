import * as path from 'path';
import {
  Config,
  ConfigStore,
  Factories,
  Logger,
  Observers,
  Scheduler,
  TaskDocument,
} from '@taskpool/core';

type Environment = Record<string, string | undefined>;

export type DependencyInjectionOptions = {
  /** Config source; defaults to an FsConfigStore per project root */
  configStore?: ConfigStore.ConfigStore;
  env?: Environment;
};

/**
 * Dependency Injection Service for the taskpool CLI
 *
 * Builds the core collaborators a command needs from the effective
 * scheduler configuration, so every logger of a run shares one level.
 */
export class DependencyInjectionService {
  private static instance: DependencyInjectionService | null = null;
  private readonly configManagers = new Map<string, Config.ConfigManager>();
  private readonly options: DependencyInjectionOptions;

  constructor(options: DependencyInjectionOptions = {}) {
    this.options = options;
  }

  /**
   * Singleton pattern to ensure single instance across CLI
   */
  static getInstance(): DependencyInjectionService {
    if (!DependencyInjectionService.instance) {
      DependencyInjectionService.instance = new DependencyInjectionService();
    }
    return DependencyInjectionService.instance;
  }

  /**
   * Reset singleton (for testing)
   */
  static reset(): void {
    DependencyInjectionService.instance = null;
  }

  getConfigManager(projectRoot: string = process.cwd()): Config.ConfigManager {
    const root = path.resolve(projectRoot);
    const cached = this.configManagers.get(root);
    if (cached) {
      return cached;
    }

    const configStore = this.options.configStore ?? new ConfigStore.FsConfigStore(root);
    const configManager = new Config.ConfigManager(configStore, this.options.env ?? process.env);
    this.configManagers.set(root, configManager);
    return configManager;
  }

  async loadSchedulerConfig(
    projectRoot?: string,
    overrides?: Config.SchedulerConfigFile
  ): Promise<Config.SchedulerConfig> {
    return this.getConfigManager(projectRoot).loadSchedulerConfig(overrides);
  }

  async loadTaskDocument(filePath: string): Promise<object[]> {
    return TaskDocument.loadTaskDocument(filePath);
  }

  createTaskFactory(config: Config.SchedulerConfig): Factories.TaskFactory {
    return new Factories.TaskFactory({
      dependencies: {
        logger: Logger.createLogger('', config.logLevel),
        timeUnitMs: config.timeUnitMs,
      },
    });
  }

  createScheduler(config: Config.SchedulerConfig): Scheduler.TaskScheduler {
    return new Scheduler.TaskScheduler({
      poolSize: config.poolSize,
      taskLogger: new Observers.TaskLogger(Logger.createLogger('[LOG] ', config.logLevel)),
      logger: Logger.createLogger('[Scheduler] ', config.logLevel),
    });
  }
}
