import { createLogger } from '../logger';
import type { Logger } from '../logger';
import type { Task } from '../task/task';
import type { TaskObserver, TaskStatus } from '../task/task.types';

/**
 * Logs one human-readable line per status transition.
 *
 * Stateless, so a single instance can be shared by every task of a run.
 */
export class TaskLogger implements TaskObserver {
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createLogger('[LOG] ');
  }

  onTransition(task: Task, oldStatus: TaskStatus, newStatus: TaskStatus): void {
    this.logger.info(`Task ${task.id} (${task.name}) status changed: ${oldStatus} → ${newStatus}`);
  }
}
