import {
  EventDispatcher,
  HeartbeatDaemon,
  registerDefaultHandlers,
} from './application/index.js';
import { EventType } from './domain/index.js';
import {
  RedisEventSubscriber,
  createHealthReporter,
  createLogger,
  createRedisConnection,
  createSlackAlertHandler,
  loadConfig,
} from './infrastructure/index.js';
import { WebhookServerComponent } from './interfaces/http/index.js';

const VERSION = '1.0.0';

/**
 * Bootstrap the agent process.
 *
 * Order:
 * 1) Config + logger
 * 2) Dispatcher + daemon
 * 3) Handlers
 * 4) Supervised components
 * 5) Scheduled tasks
 * 6) run() until SIGINT/SIGTERM
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const log = createLogger(config.log.level);

  log.info({ config: { ...config, webhook: { ...config.webhook, secret: '[redacted]' } } }, 'Config loaded');

  // --------------------------------------------------
  // Core
  // --------------------------------------------------

  const dispatcher = new EventDispatcher({
    log: log.child({ module: 'dispatcher' }),
    maxHistory: config.dispatcher.max_history,
    handlerTimeoutMs: config.dispatcher.handler_timeout * 1000,
    maxQueueSize: config.dispatcher.max_queue_size === 0
      ? Number.POSITIVE_INFINITY
      : config.dispatcher.max_queue_size,
  });

  const daemon = new HeartbeatDaemon({
    dispatcher,
    log: log.child({ module: 'daemon' }),
    heartbeatIntervalSeconds: config.daemon.heartbeat_interval,
    maxComponentRestarts: config.daemon.max_component_restarts,
    restartCooldownSeconds: config.daemon.restart_cooldown,
    healthCheckTimeoutSeconds: config.daemon.health_check_timeout,
    componentStartTimeoutSeconds: config.daemon.component_start_timeout,
    componentStopTimeoutSeconds: config.daemon.component_stop_timeout,
  });

  // --------------------------------------------------
  // Handlers
  // --------------------------------------------------

  registerDefaultHandlers(dispatcher, log.child({ module: 'handlers' }));
  dispatcher.registerHandler(
    EventType.ERROR,
    createSlackAlertHandler(config.slack, log.child({ module: 'slack' })),
  );

  const redis = config.redis.enabled ? createRedisConnection(config.redis.url) : null;

  if (redis !== null) {
    await redis.connect();
    log.info('Redis connected');

    dispatcher.registerHandler(
      EventType.HEARTBEAT,
      createHealthReporter({
        redis,
        log: log.child({ module: 'health-reporter' }),
        getHealth: () => daemon.getHealth(),
        key: config.redis.health_key,
        ttlSeconds: config.redis.health_ttl,
      }),
    );
  }

  // --------------------------------------------------
  // Supervised components
  // --------------------------------------------------

  if (config.webhook.enabled) {
    daemon.supervise('webhook_server', new WebhookServerComponent({
      deps: { dispatcher, daemon, webhookSecret: config.webhook.secret, version: VERSION },
      host: config.webhook.host,
      port: config.webhook.port,
      log: log.child({ module: 'webhook-server' }),
      serverOptions: { logger: { level: config.log.level } },
    }));
  }

  if (redis !== null) {
    daemon.supervise('redis_subscriber', new RedisEventSubscriber({
      url: config.redis.url,
      channel: config.redis.channel,
      dispatcher,
      log: log.child({ module: 'redis-subscriber' }),
    }));
  }

  // --------------------------------------------------
  // Scheduled tasks
  // --------------------------------------------------

  daemon.schedule('stats_report', async () => {
    log.info({ stats: dispatcher.getStats(), health: daemon.getHealth() }, 'Stats report');
  }, 300);

  try {
    await daemon.run();
  } finally {
    if (redis !== null) {
      await redis.quit();
      log.info('Redis disconnected');
    }
  }

  log.info('Agent stopped');
}

main().then(
  () => process.exit(0),
  (err: unknown) => {
    console.error('Fatal: agent crashed', err);
    process.exit(1);
  },
);
