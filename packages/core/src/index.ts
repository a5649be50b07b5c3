export * as Config from "./config_manager";
export * as ConfigStore from "./config_store";
export * as Errors from "./errors";
export * as EventBus from "./event_bus";
export * as Factories from "./factories";
export * as Logger from "./logger";
export * as Observers from "./task_observer";
export * as Scheduler from "./scheduler";
export * as Schemas from "./schemas";
export * as TaskDocument from "./task_document";
export * as Tasks from "./task";
export * as Validation from "./validation";

// Convenience exports for the common path
export { Task, SimulatedTask, EmailTask, BackupTask, ReportTask } from "./task";
export type { TaskStatus, TaskObserver, TaskDescription, WorkResult } from "./task";
export { TaskFactory } from "./factories";
export { TaskLogger, TaskStatusRecorder } from "./task_observer";
export { TaskScheduler, WorkerPool } from "./scheduler";
