import type { IEventStream } from '../event_bus';
import type { Logger } from '../logger';
import type { TaskObserver } from '../task/task.types';

export const DEFAULT_POOL_SIZE = 5;

/**
 * Options for the {@link TaskScheduler} constructor.
 */
export type TaskSchedulerOptions = {
  /** Maximum number of tasks running at once (default: 5) */
  poolSize?: number;
  /** Observer attached to every added task (default: a TaskLogger) */
  taskLogger?: TaskObserver;
  /** Scheduler's own diagnostics */
  logger?: Logger;
  /** Receives scheduler.run.started / scheduler.run.finished */
  eventBus?: IEventStream;
};
