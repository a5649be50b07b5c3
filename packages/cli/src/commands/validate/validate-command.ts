import { Command } from 'commander';
import { Errors } from '@taskpool/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export interface ValidateCommandOptions extends BaseCommandOptions {
  config?: string;
}

/**
 * One description the factory would refuse.
 */
export interface DescriptionProblem {
  index: number;
  code: string;
  message: string;
}

/**
 * ValidateCommand - checks a task document against the factory without
 * running anything.
 */
export class ValidateCommand extends BaseCommand<ValidateCommandOptions> {

  register(_program: Command): void {
    // Registration handled by registerValidateCommands() in validate.ts
  }

  async execute(file: string, options: ValidateCommandOptions): Promise<void> {
    try {
      const config = await this.dependencyService.loadSchedulerConfig(options.config, { logLevel: 'silent' });
      const descriptions = await this.dependencyService.loadTaskDocument(file);
      const factory = this.dependencyService.createTaskFactory(config);

      const problems: DescriptionProblem[] = [];
      descriptions.forEach((description, index) => {
        try {
          factory.createTask(description);
        } catch (error) {
          problems.push({
            index,
            code: error instanceof Errors.TaskpoolError ? error.code : 'UNKNOWN',
            message: this.errorMessage(error),
          });
        }
      });

      if (problems.length > 0) {
        for (const problem of problems) {
          this.print(`   ✗ #${problem.index} ${problem.message}`, options);
        }
        this.handleError(
          `${problems.length} of ${descriptions.length} task description(s) invalid`,
          options,
          undefined,
          1,
          { file, total: descriptions.length, problems }
        );
        return;
      }

      this.handleSuccess(
        { file, total: descriptions.length, problems },
        options,
        `${descriptions.length} task description(s) valid`
      );
    } catch (error) {
      this.handleError(
        `Validation failed: ${this.errorMessage(error)}`,
        options,
        error instanceof Error ? error : undefined
      );
    }
  }
}
