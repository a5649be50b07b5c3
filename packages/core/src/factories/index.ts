export * from './task_factory';
