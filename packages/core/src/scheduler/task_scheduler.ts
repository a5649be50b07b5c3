import { OrchestrationError } from '../errors';
import { createLogger } from '../logger';
import type { Logger } from '../logger';
import type { IEventStream } from '../event_bus';
import type { SchedulerRunFinishedEvent, SchedulerRunStartedEvent } from '../event_bus/types';
import { TaskLogger } from '../task_observer/task_logger';
import type { Task } from '../task/task';
import type { TaskObserver } from '../task/task.types';
import { WorkerPool } from './worker_pool';
import { DEFAULT_POOL_SIZE } from './scheduler.types';
import type { TaskSchedulerOptions } from './scheduler.types';

/**
 * Owns a set of tasks and runs them on a bounded worker pool.
 *
 * Every added task gets the scheduler's shared task logger attached first.
 * `runAll()` resolves once every dispatched task is terminal; a task that
 * ends `Failed` does not stop its siblings and does not reject `runAll()`.
 * Attach your own observer (e.g. a TaskStatusRecorder) to learn which
 * tasks failed.
 *
 * @example
 * ```typescript
 * const factory = new TaskFactory();
 * const scheduler = new TaskScheduler({ poolSize: 2 });
 *
 * for (const description of descriptions) {
 *   scheduler.addTask(factory.createTask(description));
 * }
 *
 * await scheduler.runAll();
 * ```
 */
export class TaskScheduler {
  private readonly tasks: Task[] = [];
  private readonly taskLogger: TaskObserver;
  private readonly pool: WorkerPool;
  private readonly logger: Logger;
  private readonly eventBus: IEventStream | undefined;
  private running = false;

  /**
   * @throws ConfigurationError if `poolSize` is not a positive integer
   */
  constructor(options: TaskSchedulerOptions = {}) {
    this.pool = new WorkerPool(options.poolSize ?? DEFAULT_POOL_SIZE);
    this.taskLogger = options.taskLogger ?? new TaskLogger();
    this.logger = options.logger ?? createLogger('[Scheduler] ');
    this.eventBus = options.eventBus;
  }

  get poolSize(): number {
    return this.pool.capacity;
  }

  /** Highest number of tasks seen running at once. */
  get peakConcurrency(): number {
    return this.pool.peakActive;
  }

  /**
   * Attaches the shared task logger, then appends the task.
   */
  addTask(task: Task): void {
    task.attach(this.taskLogger);
    this.tasks.push(task);
  }

  /** Tasks in insertion order. */
  getTasks(): readonly Task[] {
    return [...this.tasks];
  }

  /**
   * Runs every pending task and waits until all of them are terminal.
   * Tasks that already ran in an earlier call are not dispatched again.
   *
   * @throws OrchestrationError if a task's `run()` rejects (only after every
   * other task has settled), or if a run is already in progress
   */
  async runAll(): Promise<void> {
    if (this.running) {
      throw new OrchestrationError('runAll() is already in progress');
    }
    this.running = true;

    try {
      const pending = this.tasks.filter(task => task.status === 'Pending');
      const skipped = this.tasks.length - pending.length;
      if (skipped > 0) {
        this.logger.debug(`Skipping ${skipped} task(s) that already ran`);
      }

      const startedAt = Date.now();
      this.publishStarted(pending.length);
      this.logger.debug(`Running ${pending.length} task(s) with pool size ${this.pool.capacity}`);

      const settlements = await this.pool.run(pending.map(task => () => task.run()));

      const faults = settlements.flatMap(settlement =>
        settlement.status === 'rejected' ? [settlement.reason] : []
      );
      const completed = pending.filter(task => task.status === 'Completed').length;
      const failed = pending.filter(task => task.status === 'Failed').length;

      this.publishFinished(completed, failed, Date.now() - startedAt);

      if (faults.length > 0) {
        this.logger.error(`${faults.length} task(s) rejected from run()`, faults);
        throw new OrchestrationError(`${faults.length} task(s) rejected from run()`, faults);
      }
    } finally {
      this.running = false;
    }
  }

  private publishStarted(taskCount: number): void {
    if (!this.eventBus) return;

    const event: SchedulerRunStartedEvent = {
      type: 'scheduler.run.started',
      timestamp: Date.now(),
      source: 'scheduler',
      payload: { taskCount, poolSize: this.pool.capacity }
    };
    this.eventBus.publish(event);
  }

  private publishFinished(completed: number, failed: number, durationMs: number): void {
    if (!this.eventBus) return;

    const event: SchedulerRunFinishedEvent = {
      type: 'scheduler.run.finished',
      timestamp: Date.now(),
      source: 'scheduler',
      payload: { completed, failed, durationMs }
    };
    this.eventBus.publish(event);
  }
}
