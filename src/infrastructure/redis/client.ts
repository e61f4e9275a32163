import { Redis } from 'ioredis';

/**
 * Lazily-connecting ioredis connection. Callers `connect()` explicitly so
 * a failed connection surfaces where it can be handled.
 */
export function createRedisConnection(url: string): Redis {
  return new Redis(url, {
    maxRetriesPerRequest: null,
    enableReadyCheck: true,
    lazyConnect: true,
  });
}
