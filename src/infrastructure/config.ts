import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';

const booleanish = z.union([
  z.boolean(),
  z.enum(['true', 'false']).transform((v) => v === 'true'),
]);

const logLevel = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

/**
 * Agent configuration, validated after file values and environment
 * overrides are merged. Every key has a default, so an empty or missing
 * file is a valid configuration.
 */
export const configSchema = z.object({
  log: z.object({
    level: logLevel.default('info'),
  }).default({}),
  daemon: z.object({
    heartbeat_interval: z.coerce.number().positive().default(30),
    max_component_restarts: z.coerce.number().int().nonnegative().default(5),
    restart_cooldown: z.coerce.number().nonnegative().default(60),
    health_check_timeout: z.coerce.number().positive().default(10),
    component_start_timeout: z.coerce.number().positive().default(30),
    component_stop_timeout: z.coerce.number().positive().default(10),
  }).default({}),
  dispatcher: z.object({
    max_history: z.coerce.number().int().positive().default(1000),
    handler_timeout: z.coerce.number().positive().default(30),
    /** 0 means unbounded. */
    max_queue_size: z.coerce.number().int().nonnegative().default(0),
  }).default({}),
  webhook: z.object({
    enabled: booleanish.default(true),
    host: z.string().min(1).default('0.0.0.0'),
    port: z.coerce.number().int().min(0).max(65535).default(8080),
    secret: z.string().default(''),
  }).default({}),
  redis: z.object({
    enabled: booleanish.default(false),
    url: z.string().min(1).default('redis://localhost:6379'),
    channel: z.string().min(1).default('agent_events'),
    health_key: z.string().min(1).default('agent:health'),
    health_ttl: z.coerce.number().int().positive().default(90),
  }).default({}),
  slack: z.object({
    enabled: booleanish.default(false),
    webhook_url: z.string().default(''),
  }).default({}),
});

export type AgentConfig = z.infer<typeof configSchema>;

export class ConfigError extends Error {
  constructor(readonly issues: z.ZodIssue[]) {
    super(`Invalid configuration: ${issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
    this.name = 'ConfigError';
  }
}

type RawConfig = Record<string, Record<string, unknown>>;

/** Environment variable → [section, key]. */
const ENV_OVERRIDES: Record<string, readonly [string, string]> = {
  LOG_LEVEL: ['log', 'level'],
  HOST: ['webhook', 'host'],
  PORT: ['webhook', 'port'],
  WEBHOOK_SECRET: ['webhook', 'secret'],
  REDIS_URL: ['redis', 'url'],
  SLACK_WEBHOOK_URL: ['slack', 'webhook_url'],
  HEARTBEAT_INTERVAL: ['daemon', 'heartbeat_interval'],
};

/**
 * Minimal YAML reader for the flat agent config layout: top-level
 * section keys with indented scalar values. Numbers stay strings here;
 * the schema coerces them.
 */
export function parseSimpleYaml(content: string): RawConfig {
  const result: RawConfig = {};
  let section: Record<string, unknown> | null = null;

  for (const rawLine of content.split('\n')) {
    const line = rawLine.trimEnd();
    if (line.trim() === '' || line.trimStart().startsWith('#')) continue;

    const colonIdx = line.indexOf(':');
    if (colonIdx === -1) continue;

    // Top-level key (no leading whitespace)
    if (!line.startsWith(' ') && !line.startsWith('\t')) {
      section = {};
      result[line.slice(0, colonIdx).trim()] = section;
      continue;
    }

    if (section === null) continue;
    section[line.slice(0, colonIdx).trim()] = parseScalar(line.slice(colonIdx + 1).trim());
  }

  return result;
}

function parseScalar(value: string): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  if (value.length >= 2 && (
    (value.startsWith('"') && value.endsWith('"'))
    || (value.startsWith('\'') && value.endsWith('\''))
  )) {
    return value.slice(1, -1);
  }
  return value;
}

export interface LoadConfigOptions {
  /** Defaults to `config/agent.yaml` under the working directory. */
  path?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Loads `config/agent.yaml`, applies environment overrides and validates
 * the result. A missing file yields defaults; invalid values throw
 * ConfigError.
 */
export function loadConfig(options: LoadConfigOptions = {}): AgentConfig {
  const filePath = options.path ?? resolve(process.cwd(), 'config', 'agent.yaml');
  const env = options.env ?? process.env;

  const raw: RawConfig = existsSync(filePath)
    ? parseSimpleYaml(readFileSync(filePath, 'utf-8'))
    : {};

  for (const [name, [sectionName, key]] of Object.entries(ENV_OVERRIDES)) {
    const value = env[name];
    if (value === undefined || value === '') continue;
    const section = raw[sectionName] ?? {};
    section[key] = value;
    raw[sectionName] = section;
  }

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues);
  }
  return parsed.data;
}
