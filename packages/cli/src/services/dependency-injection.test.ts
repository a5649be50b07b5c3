import * as path from 'path';
import { ConfigStore } from '@taskpool/core';
import { DependencyInjectionService } from './dependency-injection';

describe('DependencyInjectionService', () => {
  afterEach(() => {
    DependencyInjectionService.reset();
  });

  it('should return the same singleton until reset', () => {
    const first = DependencyInjectionService.getInstance();

    expect(DependencyInjectionService.getInstance()).toBe(first);

    DependencyInjectionService.reset();
    expect(DependencyInjectionService.getInstance()).not.toBe(first);
  });

  it('should cache one config manager per resolved project root', () => {
    const service = new DependencyInjectionService({ env: {} });

    const first = service.getConfigManager('/project');
    expect(service.getConfigManager(path.join('/project', 'sub', '..'))).toBe(first);
    expect(service.getConfigManager('/other')).not.toBe(first);
  });

  it('should merge the store and environment into the scheduler config', async () => {
    const store = new ConfigStore.MemoryConfigStore();
    store.setConfig({ poolSize: 2 });
    const service = new DependencyInjectionService({
      configStore: store,
      env: { TASKPOOL_TIME_UNIT_MS: '5' },
    });

    await expect(service.loadSchedulerConfig()).resolves.toEqual({
      poolSize: 2,
      timeUnitMs: 5,
      logLevel: 'info',
    });
  });

  it('should build schedulers and factories from the config', () => {
    const service = new DependencyInjectionService({ env: {} });
    const config = { poolSize: 3, timeUnitMs: 10, logLevel: 'silent' as const };

    const scheduler = service.createScheduler(config);
    const task = service.createTaskFactory(config).createTask({ taskId: 1, name: 'a', type: 'backup' });
    scheduler.addTask(task);

    expect(scheduler.poolSize).toBe(3);
    expect(task.getObservers()).toHaveLength(1);
  });
});
