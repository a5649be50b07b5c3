export { ValidateCommand } from './validate-command';
export type { ValidateCommandOptions, DescriptionProblem } from './validate-command';
export { registerValidateCommands } from './validate';
