export { createRedisConnection } from './client.js';
export { RedisEventSubscriber, DEFAULT_EVENT_CHANNEL } from './event-subscriber.js';
export type {
  RedisEventSubscriberOptions,
  SubscriberClient,
  SubscriberClientFactory,
} from './event-subscriber.js';
export { createHealthReporter, DEFAULT_HEALTH_KEY } from './health-reporter.js';
export type { HealthReporterOptions, HealthKeyClient } from './health-reporter.js';
