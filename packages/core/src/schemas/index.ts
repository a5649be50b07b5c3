import TaskDescription from './task_description_schema.json';
import TaskDocument from './task_document_schema.json';
import SchedulerConfig from './scheduler_config_schema.json';

export { SchemaValidationCache } from './schema_cache';

export const Schemas = {
  TaskDescription,
  TaskDocument,
  SchedulerConfig,
} as const;
