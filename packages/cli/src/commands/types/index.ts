export { TypesCommand } from './types-command';
export type { TypesCommandOptions, TaskTypeInfo } from './types-command';
export { registerTypesCommands } from './types';
