export * from './task_document';
