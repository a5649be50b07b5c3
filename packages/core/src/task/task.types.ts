import type { TaskExecutionFault } from '../errors';
import type { Logger } from '../logger';
import type { Task } from './task';

/**
 * Lifecycle status of a task.
 */
export type TaskStatus = 'Pending' | 'Running' | 'Completed' | 'Failed';

/**
 * Statuses after which no further transition happens.
 */
export type TerminalTaskStatus = Extract<TaskStatus, 'Completed' | 'Failed'>;

/**
 * Allowed next statuses for each status.
 */
export const TASK_TRANSITIONS: Readonly<Record<TaskStatus, readonly TaskStatus[]>> = {
  Pending: ['Running'],
  Running: ['Completed', 'Failed'],
  Completed: [],
  Failed: [],
};

export function isTerminalStatus(status: TaskStatus): status is TerminalTaskStatus {
  return status === 'Completed' || status === 'Failed';
}

/**
 * Receives every status transition of the tasks it is attached to.
 * Called synchronously on the task's own execution path; implementations
 * must not mutate the task.
 */
export interface TaskObserver {
  onTransition(task: Task, oldStatus: TaskStatus, newStatus: TaskStatus): void;
}

/**
 * Outcome of a task's work step.
 */
export type WorkResult =
  | { ok: true }
  | { ok: false; fault: TaskExecutionFault };

/**
 * Collaborators shared by the tasks a factory builds.
 */
export type TaskDependencies = {
  /** Receives completion lines and observer failures */
  logger?: Logger;
  /** Milliseconds per simulated duration unit (default: 1000) */
  timeUnitMs?: number;
};

/**
 * Untyped description of a task, as read from a document.
 */
export type TaskDescription = {
  taskId: number;
  name: string;
  type: string;
};
