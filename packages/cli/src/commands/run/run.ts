import { Command, InvalidArgumentError } from 'commander';
import { RunCommand } from './run-command';
import type { RunCommandOptions } from './run-command';

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

export function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

/**
 * Registers the run command
 */
export function registerRunCommands(program: Command): void {
  const runCommand = new RunCommand();

  program
    .command('run')
    .description('Run every task described in a JSON or YAML file')
    .argument('<file>', 'Task document (JSON or YAML list of { taskId, name, type })')
    .option('-p, --pool-size <n>', 'Maximum number of tasks running at once', parseInteger)
    .option('-t, --time-unit <ms>', 'Milliseconds per simulated duration unit', parseNumber)
    .option('--skip-unknown', 'Skip descriptions with an unknown type instead of aborting')
    .option('-c, --config <dir>', 'Directory holding taskpool.config.{yaml,yml,json}')
    .option('--json', 'Output results in JSON format')
    .option('--verbose', 'Enable verbose output with detailed information')
    .option('--quiet', 'Suppress non-essential output')
    .action(async (file: string, options: RunCommandOptions) => {
      await runCommand.execute(file, options);
    });
}
