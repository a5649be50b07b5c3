import { Command } from 'commander';
import { Tasks } from '@taskpool/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export interface TypesCommandOptions extends BaseCommandOptions {
  config?: string;
}

export interface TaskTypeInfo {
  type: string;
  label: string;
  durationUnits: number;
  durationMs: number;
}

/**
 * TypesCommand - lists the task types the factory accepts.
 */
export class TypesCommand extends BaseCommand<TypesCommandOptions> {

  register(_program: Command): void {
    // Registration handled by registerTypesCommands() in types.ts
  }

  async execute(options: TypesCommandOptions): Promise<void> {
    try {
      const config = await this.dependencyService.loadSchedulerConfig(options.config, { logLevel: 'silent' });
      const registered = this.dependencyService.createTaskFactory(config).getRegisteredTypes();

      const types: TaskTypeInfo[] = Tasks.BUILT_IN_PROFILES
        .filter(profile => registered.includes(profile.type))
        .map(profile => ({
          type: profile.type,
          label: profile.label,
          durationUnits: profile.durationUnits,
          durationMs: profile.durationUnits * config.timeUnitMs,
        }));

      for (const info of types) {
        this.print(
          `   ${info.type.padEnd(8)} ${info.label.padEnd(20)} ${info.durationUnits} unit(s) (${info.durationMs}ms)`,
          options
        );
      }

      this.handleSuccess({ types }, options, `${types.length} task type(s) registered`);
    } catch (error) {
      this.handleError(
        `Failed to list task types: ${this.errorMessage(error)}`,
        options,
        error instanceof Error ? error : undefined
      );
    }
  }
}
