import { vi } from 'vitest';
import type { Logger } from 'pino';

/** Minimal fake logger. */
export function fakeLogger() {
  const log = {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(),
  };
  log.child.mockReturnValue(log);
  return log as unknown as Logger & typeof log;
}

/** Polls `predicate` until it holds or `timeoutMs` elapses. */
export async function waitFor(predicate: () => boolean, timeoutMs = 1000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) throw new Error('waitFor: condition not met in time');
    await new Promise((r) => setTimeout(r, 5));
  }
}

/** Manually advanced clock for nowFn injection. */
export function fakeClock(startIso = '2026-03-01T12:00:00.000Z') {
  let now = Date.parse(startIso);
  return {
    now: () => now,
    advance: (ms: number) => { now += ms; },
    iso: () => new Date(now).toISOString(),
  };
}
