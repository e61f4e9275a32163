import type { Logger } from 'pino';
import { customEventSchema, customEvent } from '../../application/index.js';
import type { EventDispatcher } from '../../application/index.js';
import type { SupervisedComponent } from '../../domain/index.js';
import { createRedisConnection } from './client.js';

/** The slice of an ioredis connection the subscriber uses. */
export interface SubscriberClient {
  readonly status: string;
  connect(): Promise<void>;
  subscribe(channel: string): Promise<unknown>;
  unsubscribe(channel: string): Promise<unknown>;
  quit(): Promise<unknown>;
  disconnect(): void;
  on(event: 'message', listener: (channel: string, message: string) => void): unknown;
}

export type SubscriberClientFactory = (url: string) => SubscriberClient;

export interface RedisEventSubscriberOptions {
  url: string;
  channel?: string;
  dispatcher: EventDispatcher;
  log: Logger;
  createClient?: SubscriberClientFactory;
}

export const DEFAULT_EVENT_CHANNEL = 'agent_events';

/**
 * Stream listener feeding the dispatcher from a Redis Pub/Sub channel.
 *
 * Each message is a JSON object in the custom webhook shape. Valid
 * messages are emitted; malformed ones are logged and skipped.
 * A dedicated connection is opened on every start, since a client in
 * subscriber mode cannot issue regular commands.
 */
export class RedisEventSubscriber implements SupervisedComponent {
  private readonly url: string;
  private readonly channel: string;
  private readonly dispatcher: EventDispatcher;
  private readonly log: Logger;
  private readonly createClient: SubscriberClientFactory;

  private client: SubscriberClient | null = null;
  private received = 0;

  constructor(options: RedisEventSubscriberOptions) {
    this.url = options.url;
    this.channel = options.channel ?? DEFAULT_EVENT_CHANNEL;
    this.dispatcher = options.dispatcher;
    this.log = options.log;
    this.createClient = options.createClient ?? createRedisConnection;
  }

  /** Messages accepted and emitted since construction. */
  get messagesReceived(): number {
    return this.received;
  }

  async start(): Promise<boolean> {
    const client = this.createClient(this.url);

    client.on('message', (channel, message) => {
      if (channel !== this.channel) return;
      this.handleMessage(message);
    });

    try {
      await client.connect();
      await client.subscribe(this.channel);
    } catch (err: unknown) {
      this.log.error({ err, channel: this.channel }, 'Redis event subscriber failed to connect');
      await client.quit().catch((quitErr: unknown) => {
        this.log.debug({ err: quitErr }, 'Redis quit after failed connect also failed');
      });
      return false;
    }

    this.client = client;
    this.log.info({ channel: this.channel }, 'Subscribed to agent events');
    return true;
  }

  /**
   * A connection that is not ready would hold UNSUBSCRIBE and QUIT in its
   * offline queue until Redis returns, so it is dropped instead.
   */
  async stop(): Promise<void> {
    const client = this.client;
    if (client === null) return;
    this.client = null;

    const status = client.status;
    if (status !== 'ready') {
      client.disconnect();
      this.log.info({ status }, 'Redis event subscriber dropped its connection');
      return;
    }

    try {
      await client.unsubscribe(this.channel);
    } finally {
      await client.quit();
      this.log.info('Redis event subscriber disconnected');
    }
  }

  async healthCheck(): Promise<boolean> {
    return this.client?.status === 'ready';
  }

  private handleMessage(message: string): void {
    let body: unknown;
    try {
      body = JSON.parse(message);
    } catch (err: unknown) {
      this.log.warn({ err, message }, 'Failed to parse agent event message');
      return;
    }

    const parsed = customEventSchema.safeParse(body);
    if (!parsed.success) {
      this.log.warn({ issues: parsed.error.issues }, 'Malformed agent event message, skipping');
      return;
    }

    const event = customEvent(parsed.data);
    this.received++;
    this.dispatcher.emit(event);
    this.log.debug({ event_id: event.id, event_type: event.type }, 'Agent event received from Redis');
  }
}
