import { Command } from 'commander';
import { ValidateCommand } from './validate-command';
import type { ValidateCommandOptions } from './validate-command';

/**
 * Registers the validate command
 */
export function registerValidateCommands(program: Command): void {
  const validateCommand = new ValidateCommand();

  program
    .command('validate')
    .description('Check a task document without running it')
    .argument('<file>', 'Task document (JSON or YAML)')
    .option('-c, --config <dir>', 'Directory holding taskpool.config.{yaml,yml,json}')
    .option('--json', 'Output results in JSON format')
    .option('--verbose', 'Enable verbose output with detailed information')
    .option('--quiet', 'Suppress non-essential output')
    .action(async (file: string, options: ValidateCommandOptions) => {
      await validateCommand.execute(file, options);
    });
}
