import { Command } from 'commander';
import { registerRunCommands } from './commands/run';
import { registerTypesCommands } from './commands/types';
import { registerValidateCommands } from './commands/validate';

export const CLI_VERSION = '0.1.0';

/**
 * Builds the commander program with every command registered.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('taskpool')
    .description('Run typed tasks on a bounded worker pool')
    .version(CLI_VERSION);

  registerRunCommands(program);
  registerValidateCommands(program);
  registerTypesCommands(program);

  return program;
}
