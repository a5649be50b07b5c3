export { TaskScheduler } from './task_scheduler';
export { WorkerPool, assertPoolSize } from './worker_pool';
export type { Job, JobSettlement } from './worker_pool';
export * from './scheduler.types';
