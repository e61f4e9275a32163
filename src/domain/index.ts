export {
  EventType,
  EventPriority,
  EVENT_TYPES,
  createEvent,
  toEventRecord,
  eventFromRecord,
  isEventType,
  isEventPriority,
  priorityFromString,
  priorityName,
} from './event.js';
export type { AgentEvent, EventInit, EventRecord, EventMetadata, PriorityName } from './event.js';
export { createComponentInfo, componentUptimeSeconds } from './component.js';
export type {
  ComponentInfo,
  ComponentStatus,
  HealthStatus,
  StartFn,
  StopFn,
  HealthCheckFn,
  SupervisedComponent,
} from './component.js';
export { createScheduledTask, isDue, scheduleNext } from './scheduled-task.js';
export type { ScheduledTask, TaskFn } from './scheduled-task.js';
