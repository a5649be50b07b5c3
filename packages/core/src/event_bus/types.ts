/**
 * Event Bus types for task and scheduler lifecycle events
 */
import type { TaskStatus } from '../task/task.types';

/**
 * Base event structure
 */
export type BaseEvent = {
  /** Event type identifier */
  type: string;
  /** Event timestamp */
  timestamp: number;
  /** Event payload */
  payload: unknown;
  /** Source that emitted the event */
  source: string;
};

export type TaskStatusChangedEvent = BaseEvent & {
  type: 'task.status.changed';
  payload: {
    taskId: number;
    taskName: string;
    taskType: string;
    oldStatus: TaskStatus;
    newStatus: TaskStatus;
    /** Fault message when newStatus is 'Failed' */
    reason?: string;
  };
};

export type SchedulerRunStartedEvent = BaseEvent & {
  type: 'scheduler.run.started';
  payload: {
    taskCount: number;
    poolSize: number;
  };
};

export type SchedulerRunFinishedEvent = BaseEvent & {
  type: 'scheduler.run.finished';
  payload: {
    completed: number;
    failed: number;
    durationMs: number;
  };
};

/**
 * Union type of all possible events
 */
export type TaskpoolEvent =
  | TaskStatusChangedEvent
  | SchedulerRunStartedEvent
  | SchedulerRunFinishedEvent;

/**
 * Event handler function type
 */
export type EventHandler<T extends BaseEvent = BaseEvent> = (event: T) => void | Promise<void>;

/**
 * Event subscription
 */
export type EventSubscription = {
  /** Unique subscription ID */
  id: string;
  /** Event type being subscribed to */
  eventType: string;
  /** Subscription metadata */
  metadata?: {
    subscriberName?: string;
    createdAt: number;
  };
};
