export { loadConfig, parseSimpleYaml, configSchema, ConfigError } from './config.js';
export type { AgentConfig, LoadConfigOptions } from './config.js';
export { createLogger } from './logger.js';
export {
  createRedisConnection,
  RedisEventSubscriber,
  DEFAULT_EVENT_CHANNEL,
  createHealthReporter,
  DEFAULT_HEALTH_KEY,
} from './redis/index.js';
export type {
  RedisEventSubscriberOptions,
  SubscriberClient,
  SubscriberClientFactory,
  HealthReporterOptions,
  HealthKeyClient,
} from './redis/index.js';
export { createSlackAlertHandler, formatSlackAlert } from './notifications/index.js';
export type { SlackConfig } from './notifications/index.js';
