import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { WebhookServerComponent, buildWebhookServer } from '../../src/interfaces/http/webhook-server.js';
import { EventDispatcher } from '../../src/application/event-dispatcher.js';
import { HeartbeatDaemon } from '../../src/application/heartbeat-daemon.js';
import { EventType, createEvent } from '../../src/domain/index.js';
import { fakeClock, fakeLogger } from '../helpers.js';

describe('status routes', () => {
  let clock: ReturnType<typeof fakeClock>;
  let dispatcher: EventDispatcher;
  let daemon: HeartbeatDaemon;
  let app: FastifyInstance;

  beforeEach(async () => {
    clock = fakeClock();
    const log = fakeLogger();
    dispatcher = new EventDispatcher({ log, nowFn: clock.now });
    daemon = new HeartbeatDaemon({ dispatcher, log, handleSignals: false, nowFn: clock.now });
    app = await buildWebhookServer({
      dispatcher,
      daemon,
      webhookSecret: '',
      version: '2.1.0',
      nowFn: clock.now,
    });
  });

  afterEach(async () => {
    await daemon.stop();
    await app.close();
  });

  describe('GET /health', () => {
    it('reports healthy with uptime and version', async () => {
      clock.advance(5000);

      const res = await app.inject({ method: 'GET', url: '/health' });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        status: 'healthy',
        timestamp: '2026-03-01T12:00:05.000Z',
        uptime_seconds: 5,
        version: '2.1.0',
      });
    });

    it('answers 503 when a component failed', async () => {
      daemon.registerComponent('broken', async () => false, async () => {});
      await daemon.start();

      const res = await app.inject({ method: 'GET', url: '/health' });

      expect(res.statusCode).toBe(503);
      expect(res.json().status).toBe('unhealthy');
    });
  });

  describe('GET /events/recent', () => {
    beforeEach(async () => {
      await dispatcher.dispatch(createEvent({ type: EventType.MENTION, content: 'first' }));
      await dispatcher.dispatch(createEvent({ type: EventType.DM, content: 'second' }));
      await dispatcher.dispatch(createEvent({ type: EventType.MENTION, content: 'third' }));
    });

    it('returns the most recent events up to the limit', async () => {
      const res = await app.inject({ method: 'GET', url: '/events/recent?limit=2' });

      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.total_in_history).toBe(3);
      expect(body.events.map((e: { content: string }) => e.content)).toEqual(['second', 'third']);
    });

    it('filters by event type', async () => {
      const res = await app.inject({ method: 'GET', url: '/events/recent?event_type=mention' });

      const body = res.json();
      expect(body.events).toHaveLength(2);
      expect(body.events.every((e: { type: string }) => e.type === 'mention')).toBe(true);
      expect(body.events[1].result).toBe('no_handlers');
    });

    it('rejects an unknown event type', async () => {
      const res = await app.inject({ method: 'GET', url: '/events/recent?event_type=carrier_pigeon' });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ error: 'Invalid event_type: carrier_pigeon' });
    });

    it('rejects an out of range limit', async () => {
      const res = await app.inject({ method: 'GET', url: '/events/recent?limit=0' });

      expect(res.statusCode).toBe(400);
      expect(res.json().error).toBe('Validation failed');
    });
  });

  it('GET /status returns the daemon snapshot', async () => {
    daemon.schedule('noop', async () => {}, 60);

    const res = await app.inject({ method: 'GET', url: '/status' });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body).toMatchObject({
      running: false,
      health: 'healthy',
      heartbeat_interval_seconds: 30,
      heartbeats_sent: 0,
      component_restarts: 0,
    });
    expect(body.scheduled_tasks.noop).toMatchObject({ interval_seconds: 60, enabled: true, runs: 0 });
  });
});

describe('WebhookServerComponent', () => {
  let component: WebhookServerComponent;

  beforeEach(() => {
    const log = fakeLogger();
    const dispatcher = new EventDispatcher({ log });
    const daemon = new HeartbeatDaemon({ dispatcher, log, handleSignals: false });
    component = new WebhookServerComponent({
      deps: { dispatcher, daemon, webhookSecret: '' },
      host: '127.0.0.1',
      port: 0,
      log,
    });
  });

  afterEach(async () => {
    await component.stop();
  });

  it('is not healthy before it starts listening', async () => {
    await expect(component.healthCheck()).resolves.toBe(false);
  });

  it('listens on start and closes on stop', async () => {
    await expect(component.start()).resolves.toBe(true);
    await expect(component.healthCheck()).resolves.toBe(true);

    await component.stop();
    await expect(component.healthCheck()).resolves.toBe(false);
  });

  it('can listen again after a stop', async () => {
    await component.start();
    await component.stop();

    await expect(component.start()).resolves.toBe(true);
    await expect(component.healthCheck()).resolves.toBe(true);
  });
});
