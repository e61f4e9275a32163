export {
  mentionPayloadSchema,
  trendPayloadSchema,
  musicReleasePayloadSchema,
  customEventSchema,
  recentEventsQuerySchema,
} from './event-schema.js';
export type {
  MentionPayload,
  TrendPayload,
  MusicReleasePayload,
  CustomEventPayload,
  RecentEventsQuery,
} from './event-schema.js';
export {
  mentionEvent,
  trendEvent,
  musicReleaseEvent,
  customEvent,
  INFLUENCER_FOLLOWER_THRESHOLD,
  MIN_TREND_RELEVANCE,
} from './webhook-events.js';
export { sleep, withTimeout, TimeoutError, raceShutdown, ShutdownError, errorMessage } from './async-utils.js';
export { EventDispatcher, NO_HANDLERS } from './event-dispatcher.js';
export type { EventHandler, EventDispatcherOptions, DispatcherStats } from './event-dispatcher.js';
export { ComponentSupervisor } from './component-supervisor.js';
export type { ComponentSupervisorOptions, ComponentSnapshot } from './component-supervisor.js';
export { TaskScheduler } from './task-scheduler.js';
export type { TaskSnapshot } from './task-scheduler.js';
export { HeartbeatDaemon } from './heartbeat-daemon.js';
export type { HeartbeatDaemonOptions, DaemonStatus } from './heartbeat-daemon.js';
export {
  ACKNOWLEDGED_EVENT_TYPES,
  createAcknowledgeHandler,
  registerDefaultHandlers,
} from './default-handlers.js';
