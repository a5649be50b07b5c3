import { InvalidStatusTransitionError, TaskExecutionFault } from '../errors';
import { createLogger } from '../logger';
import type { Logger } from '../logger';
import { TASK_TRANSITIONS } from './task.types';
import type {
  TaskObserver,
  TaskStatus,
  TerminalTaskStatus,
  WorkResult,
} from './task.types';

/**
 * A unit of work with identity, a name and a lifecycle status.
 *
 * Status only changes from inside `run()`, through `setStatus()`, which
 * notifies every attached observer in attachment order before returning.
 * `run()` never rejects because of the work step: a fault ends the task in
 * `Failed` and is kept on `fault`.
 *
 * @example
 * ```typescript
 * class PingTask extends Task {
 *   readonly type = 'ping';
 *   protected async perform(): Promise<WorkResult> {
 *     await ping();
 *     return { ok: true };
 *   }
 * }
 *
 * const task = new PingTask(1, 'Ping upstream');
 * task.attach(new TaskLogger());
 * await task.run(); // 'Completed' or 'Failed'
 * ```
 */
export abstract class Task {
  readonly id: number;
  readonly name: string;
  readonly createdAt: Date;
  abstract readonly type: string;

  protected readonly logger: Logger;
  private currentStatus: TaskStatus = 'Pending';
  private readonly observers: TaskObserver[] = [];
  private lastFault: TaskExecutionFault | undefined;
  private execution: Promise<TerminalTaskStatus> | undefined;

  constructor(id: number, name: string, logger?: Logger) {
    this.id = id;
    this.name = name;
    this.createdAt = new Date();
    this.logger = logger ?? createLogger();
  }

  get status(): TaskStatus {
    return this.currentStatus;
  }

  /** The fault recorded when the task ended `Failed`. */
  get fault(): TaskExecutionFault | undefined {
    return this.lastFault;
  }

  /**
   * Appends an observer. The same observer attached twice is notified twice.
   */
  attach(observer: TaskObserver): void {
    this.observers.push(observer);
  }

  getObservers(): readonly TaskObserver[] {
    return [...this.observers];
  }

  /**
   * Runs the work step and drives the task to a terminal status.
   * Calling it again returns the first run's promise, which resolves with
   * that run's terminal status; the work step is not repeated.
   */
  run(): Promise<TerminalTaskStatus> {
    if (this.execution) {
      this.logger.warn(`Task ${this.id} (${this.name}) already ${this.currentStatus}, not running again`);
      return this.execution;
    }
    this.execution = this.execute();
    return this.execution;
  }

  private async execute(): Promise<TerminalTaskStatus> {
    this.setStatus('Running');

    let result: WorkResult;
    try {
      result = await this.perform();
    } catch (error) {
      result = { ok: false, fault: TaskExecutionFault.fromUnknown(this.id, error) };
    }

    if (result.ok) {
      this.setStatus('Completed');
      return 'Completed';
    }

    this.lastFault = result.fault;
    this.setStatus('Failed');
    return 'Failed';
  }

  /**
   * The variant-specific work. Report failure with `{ ok: false, fault }`;
   * anything thrown is converted into a fault as well.
   */
  protected abstract perform(): Promise<WorkResult>;

  /**
   * Sole mutation path for `status`.
   *
   * @throws InvalidStatusTransitionError for a change outside
   * `Pending → Running → (Completed | Failed)`
   */
  protected setStatus(newStatus: TaskStatus): void {
    const oldStatus = this.currentStatus;
    if (!TASK_TRANSITIONS[oldStatus].includes(newStatus)) {
      throw new InvalidStatusTransitionError(oldStatus, newStatus);
    }

    this.currentStatus = newStatus;
    this.notify(oldStatus, newStatus);
  }

  private notify(oldStatus: TaskStatus, newStatus: TaskStatus): void {
    for (const observer of this.observers) {
      try {
        observer.onTransition(this, oldStatus, newStatus);
      } catch (error) {
        this.logger.error(`Observer failed on task ${this.id} (${oldStatus} → ${newStatus}):`, error);
      }
    }
  }
}
