export { TaskLogger } from './task_logger';
export { TaskStatusRecorder } from './task_status_recorder';
export type { TaskOutcome } from './task_status_recorder';
export { EventBusObserver } from './event_bus_observer';
