import { Task } from './task';
import type { TaskDependencies, WorkResult } from './task.types';

export const DEFAULT_TIME_UNIT_MS = 1000;

/**
 * What distinguishes one built-in task type from another.
 */
export type TaskVariantProfile = {
  /** Discriminant used in task descriptions */
  type: string;
  /** Prefix of the completion line, e.g. `EmailTask` */
  label: string;
  /** Simulated work duration, in time units */
  durationUnits: number;
  /** Completion line body for a finished task */
  describe(task: Task): string;
};

export const EMAIL_TASK: TaskVariantProfile = {
  type: 'email',
  label: 'EmailTask',
  durationUnits: 2,
  describe: (task) => `Sending email for Task ${task.id}`,
};

export const BACKUP_TASK: TaskVariantProfile = {
  type: 'backup',
  label: 'DataBackupTask',
  durationUnits: 3,
  describe: (task) => `Backing up data for Task ${task.id}`,
};

export const REPORT_TASK: TaskVariantProfile = {
  type: 'report',
  label: 'ReportGenerationTask',
  durationUnits: 1,
  describe: (task) => `Generating report for Task ${task.id}`,
};

export const BUILT_IN_PROFILES: readonly TaskVariantProfile[] = [EMAIL_TASK, BACKUP_TASK, REPORT_TASK];

/** Longest delay a single timer accepts; Node fires longer ones after 1 ms. */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

async function sleep(ms: number): Promise<void> {
  let remaining = ms;
  do {
    const delay = Math.min(remaining, MAX_TIMER_DELAY_MS);
    await new Promise(resolve => setTimeout(resolve, delay));
    remaining -= delay;
  } while (remaining > 0);
}

/**
 * A task whose work is a fixed delay standing in for real I/O,
 * followed by a completion line.
 */
export class SimulatedTask extends Task {
  readonly type: string;
  readonly profile: TaskVariantProfile;
  private readonly timeUnitMs: number;

  constructor(id: number, name: string, profile: TaskVariantProfile, dependencies: TaskDependencies = {}) {
    super(id, name, dependencies.logger);
    this.profile = profile;
    this.type = profile.type;
    this.timeUnitMs = dependencies.timeUnitMs ?? DEFAULT_TIME_UNIT_MS;
  }

  /** Simulated work duration in milliseconds. */
  get durationMs(): number {
    return this.profile.durationUnits * this.timeUnitMs;
  }

  protected async perform(): Promise<WorkResult> {
    await sleep(this.durationMs);
    this.logger.info(`[${this.profile.label}] ${this.profile.describe(this)}`);
    return { ok: true };
  }
}

export class EmailTask extends SimulatedTask {
  constructor(id: number, name: string, dependencies?: TaskDependencies) {
    super(id, name, EMAIL_TASK, dependencies);
  }
}

export class BackupTask extends SimulatedTask {
  constructor(id: number, name: string, dependencies?: TaskDependencies) {
    super(id, name, BACKUP_TASK, dependencies);
  }
}

export class ReportTask extends SimulatedTask {
  constructor(id: number, name: string, dependencies?: TaskDependencies) {
    super(id, name, REPORT_TASK, dependencies);
  }
}
