export { Task } from './task';
export * from './task.types';
export * from './task_variants';
