import { Command } from 'commander';
import { TypesCommand } from './types-command';
import type { TypesCommandOptions } from './types-command';

/**
 * Registers the types command
 */
export function registerTypesCommands(program: Command): void {
  const typesCommand = new TypesCommand();

  program
    .command('types')
    .description('List the registered task types and their durations')
    .option('-c, --config <dir>', 'Directory holding taskpool.config.{yaml,yml,json}')
    .option('--json', 'Output results in JSON format')
    .option('--quiet', 'Suppress non-essential output')
    .action(async (options: TypesCommandOptions) => {
      await typesCommand.execute(options);
    });
}
