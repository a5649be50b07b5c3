import { isTerminalStatus } from '../task/task.types';
import type { Task } from '../task/task';
import type { TaskObserver, TaskStatus } from '../task/task.types';

/**
 * Final state of one task as seen by a {@link TaskStatusRecorder}.
 */
export type TaskOutcome = {
  taskId: number;
  name: string;
  type: string;
  status: TaskStatus;
  /** Every status the task held, starting with 'Pending' */
  history: TaskStatus[];
  /** Fault message for failed tasks */
  error?: string;
};

/**
 * Keeps the status history of every task it observes.
 *
 * `runAll()` reports nothing per task; attach a recorder to find out which
 * tasks failed and why. Histories are keyed by task instance, so two tasks
 * sharing an id are still tracked apart.
 */
export class TaskStatusRecorder implements TaskObserver {
  private readonly histories = new Map<Task, TaskStatus[]>();

  onTransition(task: Task, oldStatus: TaskStatus, newStatus: TaskStatus): void {
    const history = this.histories.get(task);
    if (history) {
      history.push(newStatus);
    } else {
      this.histories.set(task, [oldStatus, newStatus]);
    }
  }

  /** Statuses observed for a task; empty if it never transitioned. */
  getHistory(task: Task): TaskStatus[] {
    return [...(this.histories.get(task) ?? [])];
  }

  getOutcomes(): TaskOutcome[] {
    return Array.from(this.histories.entries()).map(([task, history]) => ({
      taskId: task.id,
      name: task.name,
      type: task.type,
      status: task.status,
      history: [...history],
      ...(task.fault && { error: task.fault.message }),
    }));
  }

  getFailedTasks(): Task[] {
    return Array.from(this.histories.keys()).filter(task => task.status === 'Failed');
  }

  /** Number of observed tasks that reached a terminal status. */
  countTerminal(): number {
    return Array.from(this.histories.keys()).filter(task => isTerminalStatus(task.status)).length;
  }

  clear(): void {
    this.histories.clear();
  }
}
