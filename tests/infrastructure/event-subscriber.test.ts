import { describe, it, expect, vi, beforeEach } from 'vitest';
import { RedisEventSubscriber } from '../../src/infrastructure/redis/event-subscriber.js';
import type { SubscriberClient } from '../../src/infrastructure/redis/event-subscriber.js';
import { EventDispatcher } from '../../src/application/event-dispatcher.js';
import { EventPriority, EventType } from '../../src/domain/index.js';
import { fakeLogger } from '../helpers.js';

/** In-process stand-in for an ioredis subscriber connection. */
class FakeSubscriberClient implements SubscriberClient {
  status = 'wait';
  readonly subscribed: string[] = [];
  private listener: ((channel: string, message: string) => void) | null = null;

  connect = vi.fn(async () => {
    this.status = 'ready';
  });
  subscribe = vi.fn(async (channel: string) => {
    this.subscribed.push(channel);
    return 1;
  });
  unsubscribe = vi.fn(async () => 0);
  quit = vi.fn(async () => {
    this.status = 'end';
    return 'OK';
  });
  disconnect = vi.fn(() => {
    this.status = 'end';
  });

  on(_event: 'message', listener: (channel: string, message: string) => void): this {
    this.listener = listener;
    return this;
  }

  publish(channel: string, message: string): void {
    this.listener?.(channel, message);
  }
}

describe('RedisEventSubscriber', () => {
  let log: ReturnType<typeof fakeLogger>;
  let dispatcher: EventDispatcher;
  let client: FakeSubscriberClient;
  let subscriber: RedisEventSubscriber;

  beforeEach(() => {
    log = fakeLogger();
    dispatcher = new EventDispatcher({ log });
    client = new FakeSubscriberClient();
    subscriber = new RedisEventSubscriber({
      url: 'redis://localhost:6379',
      dispatcher,
      log,
      createClient: () => client,
    });
  });

  it('subscribes to the default channel on start', async () => {
    await expect(subscriber.start()).resolves.toBe(true);

    expect(client.connect).toHaveBeenCalledOnce();
    expect(client.subscribed).toEqual(['agent_events']);
    await expect(subscriber.healthCheck()).resolves.toBe(true);
  });

  it('emits valid messages on the dispatcher', async () => {
    await subscriber.start();

    client.publish('agent_events', JSON.stringify({
      event_type: 'dm',
      user_name: 'fan_account',
      content: 'hello there',
      priority: 'high',
    }));

    const stats = dispatcher.getStats();
    expect(stats.events_received).toBe(1);
    expect(stats.queue_size).toBe(1);
    expect(subscriber.messagesReceived).toBe(1);
  });

  it('maps message fields onto the queued event', async () => {
    const seen: Array<{ type: string; priority: number; content: string }> = [];
    dispatcher.registerHandler(EventType.DM, async (e) => {
      seen.push({ type: e.type, priority: e.priority, content: e.content });
      return 'ok';
    });
    await subscriber.start();
    await dispatcher.start();

    client.publish('agent_events', JSON.stringify({ event_type: 'dm', content: 'hello', priority: 'high' }));
    await vi.waitFor(() => expect(seen).toHaveLength(1));
    await dispatcher.stop();

    expect(seen[0]).toEqual({ type: EventType.DM, priority: EventPriority.HIGH, content: 'hello' });
  });

  it('skips malformed messages and other channels', async () => {
    await subscriber.start();

    client.publish('agent_events', 'not json');
    client.publish('agent_events', JSON.stringify({ content: 'missing type' }));
    client.publish('other_channel', JSON.stringify({ event_type: 'dm' }));

    expect(dispatcher.getStats().events_received).toBe(0);
    expect(log.warn).toHaveBeenCalledWith(
      expect.objectContaining({ message: 'not json' }),
      'Failed to parse agent event message',
    );
    expect(log.warn).toHaveBeenCalledWith(
      expect.objectContaining({ issues: expect.any(Array) }),
      'Malformed agent event message, skipping',
    );
  });

  it('returns false and closes the client when connect fails', async () => {
    client.connect.mockRejectedValueOnce(new Error('ECONNREFUSED'));

    await expect(subscriber.start()).resolves.toBe(false);

    expect(client.quit).toHaveBeenCalledOnce();
    await expect(subscriber.healthCheck()).resolves.toBe(false);
  });

  it('unsubscribes and quits on stop', async () => {
    await subscriber.start();
    await subscriber.stop();

    expect(client.unsubscribe).toHaveBeenCalledWith('agent_events');
    expect(client.quit).toHaveBeenCalledOnce();
    await expect(subscriber.healthCheck()).resolves.toBe(false);

    await subscriber.stop();
    expect(client.quit).toHaveBeenCalledOnce();
  });

  it('reports unhealthy once the connection drops', async () => {
    await subscriber.start();
    client.status = 'reconnecting';

    await expect(subscriber.healthCheck()).resolves.toBe(false);
  });

  it('drops a reconnecting connection on stop without queuing commands', async () => {
    await subscriber.start();
    client.status = 'reconnecting';
    client.unsubscribe.mockImplementation(() => new Promise<number>(() => {}));

    await subscriber.stop();

    expect(client.disconnect).toHaveBeenCalledOnce();
    expect(client.unsubscribe).not.toHaveBeenCalled();
    expect(client.quit).not.toHaveBeenCalled();
    expect(client.status).toBe('end');
  });
});
