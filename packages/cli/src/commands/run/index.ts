export { RunCommand } from './run-command';
export type { RunCommandOptions, RunSummary } from './run-command';
export { registerRunCommands } from './run';
