import type { IEventStream } from '../event_bus';
import type { TaskStatusChangedEvent } from '../event_bus/types';
import type { Task } from '../task/task';
import type { TaskObserver, TaskStatus } from '../task/task.types';

/**
 * Republishes every task transition as a `task.status.changed` event.
 */
export class EventBusObserver implements TaskObserver {
  constructor(
    private readonly eventBus: IEventStream,
    private readonly source: string = 'task'
  ) { }

  onTransition(task: Task, oldStatus: TaskStatus, newStatus: TaskStatus): void {
    const event: TaskStatusChangedEvent = {
      type: 'task.status.changed',
      timestamp: Date.now(),
      source: this.source,
      payload: {
        taskId: task.id,
        taskName: task.name,
        taskType: task.type,
        oldStatus,
        newStatus,
        ...(newStatus === 'Failed' && task.fault && { reason: task.fault.message }),
      },
    };
    this.eventBus.publish(event);
  }
}
