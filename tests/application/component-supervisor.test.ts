import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Mock } from 'vitest';
import { ComponentSupervisor } from '../../src/application/component-supervisor.js';
import { fakeClock, fakeLogger } from '../helpers.js';

function fakeComponent(options: { starts?: boolean; healthy?: boolean } = {}) {
  return {
    start: vi.fn(async () => options.starts ?? true),
    stop: vi.fn(async () => undefined),
    healthCheck: vi.fn(async () => options.healthy ?? true),
  };
}

describe('ComponentSupervisor', () => {
  let log: ReturnType<typeof fakeLogger>;
  let onFailure: Mock<(name: string, reason: string) => void>;
  let supervisor: ComponentSupervisor;

  beforeEach(() => {
    log = fakeLogger();
    onFailure = vi.fn<(name: string, reason: string) => void>();
    supervisor = new ComponentSupervisor({ log, maxRestarts: 2, restartCooldownMs: 0, onFailure });
  });

  describe('register', () => {
    it('registers components as stopped', () => {
      const c = fakeComponent();
      supervisor.register('x_stream', c.start, c.stop, c.healthCheck);

      expect(supervisor.get('x_stream')).toEqual({
        status: 'stopped',
        uptime_seconds: 0,
        started_at: null,
        stopped_at: null,
        restarts: 0,
        consecutive_failures: 0,
        last_error: '',
        has_health_check: true,
      });
    });

    it('rejects duplicate names', () => {
      const c = fakeComponent();
      supervisor.register('x_stream', c.start, c.stop);
      expect(() => supervisor.register('x_stream', c.start, c.stop)).toThrow(
        'Component "x_stream" is already registered',
      );
    });
  });

  describe('startAll', () => {
    it('starts every component in registration order', async () => {
      const order: string[] = [];
      supervisor.register('a', async () => { order.push('a'); return true; }, async () => undefined);
      supervisor.register('b', async () => { order.push('b'); return true; }, async () => undefined);

      await supervisor.startAll();

      expect(order).toEqual(['a', 'b']);
      expect(supervisor.statuses()).toEqual(['running', 'running']);
      expect(supervisor.get('a')?.started_at).not.toBeNull();
    });

    it('marks a component failed when start returns false and keeps going', async () => {
      const bad = fakeComponent({ starts: false });
      const good = fakeComponent();
      supervisor.register('bad', bad.start, bad.stop);
      supervisor.register('good', good.start, good.stop);

      await supervisor.startAll();

      expect(supervisor.get('bad')).toMatchObject({
        status: 'failed',
        last_error: 'start function returned false',
        consecutive_failures: 1,
      });
      expect(supervisor.get('good')?.status).toBe('running');
      expect(onFailure).toHaveBeenCalledWith('bad', 'start function returned false');
    });

    it('records the message when start throws', async () => {
      supervisor.register('boom', async () => { throw new Error('port in use'); }, async () => undefined);

      await supervisor.startAll();

      expect(supervisor.get('boom')).toMatchObject({ status: 'failed', last_error: 'port in use' });
      expect(onFailure).toHaveBeenCalledWith('boom', 'port in use');
    });
  });

  describe('checkAll', () => {
    it('leaves healthy components alone', async () => {
      const c = fakeComponent();
      supervisor.register('ok', c.start, c.stop, c.healthCheck);
      await supervisor.startAll();

      await supervisor.checkAll();

      expect(c.healthCheck).toHaveBeenCalledOnce();
      expect(c.stop).not.toHaveBeenCalled();
      expect(supervisor.totalRestarts).toBe(0);
    });

    it('restarts an unhealthy component', async () => {
      const c = fakeComponent();
      c.healthCheck.mockResolvedValueOnce(false);
      supervisor.register('flaky', c.start, c.stop, c.healthCheck);
      await supervisor.startAll();

      await supervisor.checkAll();

      expect(c.stop).toHaveBeenCalledOnce();
      expect(c.start).toHaveBeenCalledTimes(2);
      expect(supervisor.get('flaky')).toMatchObject({ status: 'running', restarts: 1 });
      expect(supervisor.totalRestarts).toBe(1);
    });

    it('treats a throwing health check as unhealthy', async () => {
      const c = fakeComponent();
      c.healthCheck.mockRejectedValueOnce(new Error('socket closed'));
      supervisor.register('flaky', c.start, c.stop, c.healthCheck);
      await supervisor.startAll();

      await supervisor.checkAll();

      expect(supervisor.get('flaky')?.restarts).toBe(1);
    });

    it('treats a hung health check as unhealthy', async () => {
      supervisor = new ComponentSupervisor({ log, restartCooldownMs: 0, healthCheckTimeoutMs: 10 });
      const c = fakeComponent();
      c.healthCheck.mockImplementationOnce(() => new Promise<boolean>(() => undefined));
      supervisor.register('hung', c.start, c.stop, c.healthCheck);
      await supervisor.startAll();

      await supervisor.checkAll();

      expect(supervisor.get('hung')).toMatchObject({ status: 'running', restarts: 1 });
    });

    it('gives up after maxRestarts and marks the component failed', async () => {
      const c = fakeComponent({ healthy: false });
      supervisor.register('doomed', c.start, c.stop, c.healthCheck);
      await supervisor.startAll();

      await supervisor.checkAll();
      await supervisor.checkAll();
      expect(supervisor.get('doomed')).toMatchObject({ status: 'running', restarts: 2 });

      await supervisor.checkAll();

      expect(supervisor.get('doomed')).toMatchObject({
        status: 'failed',
        restarts: 2,
        last_error: 'health check failed after 2 restarts, giving up',
      });
      expect(c.start).toHaveBeenCalledTimes(3);
      expect(onFailure).toHaveBeenCalledWith('doomed', 'health check failed after 2 restarts, giving up');

      // Failed components are no longer checked.
      await supervisor.checkAll();
      expect(c.healthCheck).toHaveBeenCalledTimes(3);
      expect(c.start).toHaveBeenCalledTimes(3);
    });

    it('does not start again when shutdown lands during the cooldown', async () => {
      supervisor = new ComponentSupervisor({ log, restartCooldownMs: 60_000 });
      const c = fakeComponent({ healthy: false });
      supervisor.register('slow', c.start, c.stop, c.healthCheck);
      await supervisor.startAll();

      const ac = new AbortController();
      const pending = supervisor.checkAll(ac.signal);
      ac.abort();
      await pending;

      expect(supervisor.get('slow')?.status).toBe('stopped');
      expect(c.start).toHaveBeenCalledOnce();
    });

    it('stops waiting on a hung stop once shutdown is requested', async () => {
      supervisor = new ComponentSupervisor({ log, restartCooldownMs: 0, stopTimeoutMs: 1_000 });
      const c = fakeComponent({ healthy: false });
      c.stop.mockImplementation(() => new Promise<undefined>(() => {}));
      supervisor.register('stuck', c.start, c.stop, c.healthCheck);
      await supervisor.startAll();

      const ac = new AbortController();
      const pending = supervisor.checkAll(ac.signal);
      await vi.waitFor(() => expect(c.stop).toHaveBeenCalledOnce());
      ac.abort();
      await pending;

      expect(supervisor.get('stuck')).toMatchObject({ status: 'stopped', last_error: 'Shutdown requested' });
      expect(c.start).toHaveBeenCalledOnce();
    });
  });

  describe('timeouts', () => {
    it('records a stop that outlives the stop timeout', async () => {
      supervisor = new ComponentSupervisor({ log, stopTimeoutMs: 20 });
      const c = fakeComponent();
      c.stop.mockImplementation(() => new Promise<undefined>(() => {}));
      supervisor.register('stuck', c.start, c.stop);
      await supervisor.startAll();

      await supervisor.stopAll();

      expect(supervisor.get('stuck')).toMatchObject({
        status: 'stopped',
        last_error: 'stop timed out after 20ms',
      });
    });

    it('fails a start that outlives the start timeout', async () => {
      supervisor = new ComponentSupervisor({ log, startTimeoutMs: 20, onFailure });
      supervisor.register('slow', () => new Promise<boolean>(() => {}), async () => undefined);

      await supervisor.startAll();

      expect(supervisor.get('slow')).toMatchObject({
        status: 'failed',
        last_error: 'start timed out after 20ms',
      });
      expect(onFailure).toHaveBeenCalledWith('slow', 'start timed out after 20ms');
    });
  });

  describe('stop and removal', () => {
    it('stops everything and records stop errors', async () => {
      const c = fakeComponent();
      c.stop.mockRejectedValueOnce(new Error('already closed'));
      supervisor.register('a', c.start, c.stop);
      await supervisor.startAll();

      await supervisor.stopAll();

      expect(supervisor.get('a')).toMatchObject({ status: 'stopped', last_error: 'already closed' });
      expect(supervisor.get('a')?.stopped_at).not.toBeNull();
    });

    it('does not stop a component twice', async () => {
      const c = fakeComponent();
      supervisor.register('a', c.start, c.stop);
      await supervisor.startAll();

      await supervisor.stopAll();
      await supervisor.stopAll();

      expect(c.stop).toHaveBeenCalledOnce();
    });

    it('unregisters a running component after stopping it', async () => {
      const c = fakeComponent();
      supervisor.register('a', c.start, c.stop);
      await supervisor.startAll();

      await expect(supervisor.unregister('a')).resolves.toBe(true);
      await expect(supervisor.unregister('a')).resolves.toBe(false);

      expect(c.stop).toHaveBeenCalledOnce();
      expect(supervisor.size).toBe(0);
    });
  });

  describe('restart', () => {
    it('brings a given-up component back and clears its restart budget', async () => {
      const c = fakeComponent({ healthy: false });
      supervisor.register('doomed', c.start, c.stop, c.healthCheck);
      await supervisor.startAll();
      for (let i = 0; i < 3; i++) await supervisor.checkAll();
      expect(supervisor.get('doomed')?.status).toBe('failed');

      await expect(supervisor.restart('doomed')).resolves.toBe(true);

      expect(supervisor.get('doomed')).toMatchObject({ status: 'running', restarts: 0 });
    });

    it('returns false for unknown components', async () => {
      await expect(supervisor.restart('nope')).resolves.toBe(false);
    });
  });

  it('reports uptime only while running', async () => {
    const clock = fakeClock();
    supervisor = new ComponentSupervisor({ log, nowFn: clock.now });
    const c = fakeComponent();
    supervisor.register('a', c.start, c.stop);
    await supervisor.startAll();

    clock.advance(1500);
    expect(supervisor.get('a')?.uptime_seconds).toBe(1.5);

    await supervisor.stopAll();
    expect(supervisor.get('a')?.uptime_seconds).toBe(0);
  });
});
