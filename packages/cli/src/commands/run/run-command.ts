import { Command } from 'commander';
import { Observers } from '@taskpool/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export interface RunCommandOptions extends BaseCommandOptions {
  poolSize?: number;
  timeUnit?: number;
  skipUnknown?: boolean;
  config?: string;
}

/**
 * Result of one `taskpool run`, as printed with --json.
 */
export interface RunSummary {
  file: string;
  poolSize: number;
  total: number;
  completed: number;
  failed: number;
  rejected: Array<{ index: number; type: string }>;
  durationMs: number;
  tasks: Observers.TaskOutcome[];
}

/**
 * RunCommand - builds every task of a document and runs it on the pool.
 *
 * Exits 1 when a task fails, a description is rejected or the document
 * cannot be loaded.
 */
export class RunCommand extends BaseCommand<RunCommandOptions> {

  register(_program: Command): void {
    // Registration handled by registerRunCommands() in run.ts
  }

  async execute(file: string, options: RunCommandOptions): Promise<void> {
    try {
      const logLevel = this.logLevelFor(options);
      const config = await this.dependencyService.loadSchedulerConfig(options.config, {
        ...(options.poolSize !== undefined && { poolSize: options.poolSize }),
        ...(options.timeUnit !== undefined && { timeUnitMs: options.timeUnit }),
        ...(logLevel && { logLevel }),
      });

      const descriptions = await this.dependencyService.loadTaskDocument(file);
      const factory = this.dependencyService.createTaskFactory(config);
      const { tasks, rejected } = factory.createTasks(descriptions, {
        skipUnknown: options.skipUnknown ?? false
      });

      for (const { index, error } of rejected) {
        this.print(`⚠️  Skipping description #${index}: ${error.message}`, options);
      }

      const scheduler = this.dependencyService.createScheduler(config);
      const recorder = new Observers.TaskStatusRecorder();
      for (const task of tasks) {
        scheduler.addTask(task);
        task.attach(recorder);
      }

      const startedAt = Date.now();
      await scheduler.runAll();

      const outcomes = recorder.getOutcomes();
      const summary: RunSummary = {
        file,
        poolSize: scheduler.poolSize,
        total: tasks.length,
        completed: outcomes.filter(outcome => outcome.status === 'Completed').length,
        failed: outcomes.filter(outcome => outcome.status === 'Failed').length,
        rejected: rejected.map(({ index, error }) => ({ index, type: error.taskType })),
        durationMs: Date.now() - startedAt,
        tasks: outcomes,
      };

      this.renderSummary(summary, options);

      if (summary.failed > 0 || summary.rejected.length > 0) {
        this.handleError(
          `${summary.failed} task(s) failed, ${summary.rejected.length} description(s) rejected`,
          options,
          undefined,
          1,
          summary
        );
        return;
      }

      this.handleSuccess(summary, options, `All ${summary.total} task(s) completed`);
    } catch (error) {
      this.handleError(
        `Run failed: ${this.errorMessage(error)}`,
        options,
        error instanceof Error ? error : undefined
      );
    }
  }

  private renderSummary(summary: RunSummary, options: RunCommandOptions): void {
    this.print('', options);
    this.print(`📋 ${summary.total} task(s) on a pool of ${summary.poolSize} in ${summary.durationMs}ms`, options);
    for (const outcome of summary.tasks) {
      const icon = outcome.status === 'Completed' ? '✓' : '✗';
      const reason = outcome.error ? `: ${outcome.error}` : '';
      this.print(`   ${icon} Task ${outcome.taskId} (${outcome.name}) [${outcome.type}] ${outcome.status}${reason}`, options);
    }
  }
}
