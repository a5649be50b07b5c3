export * from './event_bus';
export * from './types';
