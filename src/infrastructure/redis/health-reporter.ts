import type { Logger } from 'pino';
import type { EventHandler } from '../../application/index.js';
import type { AgentEvent, HealthStatus } from '../../domain/index.js';

/** The slice of an ioredis connection the reporter uses. */
export interface HealthKeyClient {
  set(key: string, value: string, mode: 'EX', seconds: number): Promise<unknown>;
}

export interface HealthReporterOptions {
  redis: HealthKeyClient;
  log: Logger;
  getHealth: () => HealthStatus;
  key?: string;
  ttlSeconds?: number;
}

export const DEFAULT_HEALTH_KEY = 'agent:health';

/**
 * HEARTBEAT handler that mirrors the daemon health into a Redis key with
 * a TTL. A missing key means no heartbeat within the TTL: the agent is
 * down or wedged.
 */
export function createHealthReporter(options: HealthReporterOptions): EventHandler {
  const key = options.key ?? DEFAULT_HEALTH_KEY;
  const ttl = options.ttlSeconds ?? 90;
  const { redis, log, getHealth } = options;

  return async function reportHealth(event: AgentEvent): Promise<string> {
    const health = getHealth();
    await redis.set(key, health, 'EX', ttl);
    log.debug({ key, health, event_id: event.id }, 'Health key refreshed');
    return `health ${health} written to ${key}`;
  };
}
