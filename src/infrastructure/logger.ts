import { pino } from 'pino';
import type { Logger } from 'pino';

/** Root process logger. Modules take a child carrying `{ module }`. */
export function createLogger(level: string = process.env['LOG_LEVEL'] ?? 'info'): Logger {
  return pino({ level, base: { service: 'agent-heartbeat' } });
}
