import PQueue from 'p-queue';
import type { Logger } from 'pino';
import {
  EventPriority,
  EventType,
  createEvent,
  priorityName,
  toEventRecord,
} from '../domain/index.js';
import type { AgentEvent, EventRecord } from '../domain/index.js';
import { TimeoutError, errorMessage, withTimeout } from './async-utils.js';

/**
 * A handler turns an event into a short summary of what it did.
 *
 * `signal` aborts when the handler's timeout elapses or the dispatcher
 * stops; handlers doing I/O should pass it along.
 */
export type EventHandler = (event: AgentEvent, signal: AbortSignal) => Promise<string>;

export const NO_HANDLERS = 'no_handlers';
const RESULT_SEPARATOR = ' | ';

/** Raised by the agent itself; missing handlers for these are expected. */
const SYSTEM_EVENT_TYPES: ReadonlySet<EventType> = new Set([
  EventType.HEARTBEAT,
  EventType.STARTUP,
  EventType.SHUTDOWN,
]);

export interface EventDispatcherOptions {
  log: Logger;
  /** History cap; oldest entries are evicted first. */
  maxHistory?: number;
  /** Per-handler ceiling in milliseconds. */
  handlerTimeoutMs?: number;
  /** Queue cap; `emit` drops events beyond it. */
  maxQueueSize?: number;
  nowFn?: () => number;
}

export interface DispatcherStats {
  running: boolean;
  queue_size: number;
  events_received: number;
  events_processed: number;
  events_failed: number;
  events_dropped: number;
  handlers_registered: number;
  history_size: number;
}

/**
 * Central event bus.
 *
 * - Handler registry keyed by event type (many handlers per type).
 * - A paused-until-start p-queue with concurrency 1 serves one event at a
 *   time; higher priority first, FIFO within a priority.
 * - Each handler runs under a timeout and in isolation: a failure is
 *   written to the event and counted, and the remaining handlers still run.
 * - Bounded in-memory history of processed events.
 *
 * `emit()` queues; `dispatch()` processes in the caller's context. The two
 * paths are not synchronised with each other.
 */
export class EventDispatcher {
  private readonly log: Logger;
  private readonly handlers: Map<EventType, EventHandler[]> = new Map();
  private readonly queue = new PQueue({ concurrency: 1, autoStart: false });
  /** Events waiting in the queue; an event is queued at most once. */
  private readonly queued = new WeakSet<AgentEvent>();
  private readonly history: AgentEvent[] = [];
  /** Lifecycle events raised by the dispatcher itself; kept out of the counters. */
  private readonly internal = new WeakSet<AgentEvent>();

  private readonly maxHistory: number;
  private readonly handlerTimeoutMs: number;
  private readonly maxQueueSize: number;
  private readonly nowFn: () => number;

  private running = false;
  private ac: AbortController | null = null;

  private eventsReceived = 0;
  private eventsProcessed = 0;
  private eventsFailed = 0;
  private eventsDropped = 0;

  constructor(options: EventDispatcherOptions) {
    this.log = options.log;
    this.maxHistory = options.maxHistory ?? 1000;
    this.handlerTimeoutMs = options.handlerTimeoutMs ?? 30_000;
    this.maxQueueSize = options.maxQueueSize ?? Number.POSITIVE_INFINITY;
    this.nowFn = options.nowFn ?? Date.now;
  }

  get isRunning(): boolean {
    return this.running;
  }

  registerHandler(type: EventType, handler: EventHandler): void {
    const list = this.handlers.get(type) ?? [];
    list.push(handler);
    this.handlers.set(type, list);
    this.log.info({ event_type: type, handler: handlerName(handler) }, 'Handler registered');
  }

  /** Returns false when the handler was not registered for `type`. */
  unregisterHandler(type: EventType, handler: EventHandler): boolean {
    const list = this.handlers.get(type);
    const idx = list?.indexOf(handler) ?? -1;
    if (list === undefined || idx === -1) return false;

    list.splice(idx, 1);
    this.log.info({ event_type: type, handler: handlerName(handler) }, 'Handler unregistered');
    return true;
  }

  /** Queues an event for processing. Never blocks on processing. */
  emit(event: AgentEvent): void {
    if (!this.enqueue(event)) return;
    this.eventsReceived++;
  }

  /** Processes an event immediately, bypassing the queue. */
  async dispatch(event: AgentEvent): Promise<string> {
    if (event.processed) {
      this.log.warn({ event_id: event.id }, 'Event already processed, not dispatching again');
      return event.result;
    }
    return this.processEvent(event);
  }

  async start(): Promise<void> {
    if (this.running) {
      this.log.warn('EventDispatcher already running');
      return;
    }

    this.running = true;
    this.ac = new AbortController();

    const startup = createEvent({
      type: EventType.STARTUP,
      priority: EventPriority.HIGH,
      source: 'dispatcher',
      content: 'EventDispatcher started',
    });
    this.internal.add(startup);
    this.enqueue(startup);

    this.queue.start();
    this.log.info('EventDispatcher started');
  }

  /**
   * Dispatches a shutdown event synchronously, then pauses the queue and
   * waits for the event in flight. Events still queued stay queued.
   */
  async stop(): Promise<void> {
    if (!this.running) return;

    const shutdown = createEvent({
      type: EventType.SHUTDOWN,
      priority: EventPriority.CRITICAL,
      source: 'dispatcher',
      content: 'EventDispatcher shutting down',
    });
    this.internal.add(shutdown);
    await this.dispatch(shutdown);

    this.running = false;
    this.queue.pause();
    this.ac?.abort();
    while (this.queue.pending > 0) {
      await new Promise<void>((resolve) => {
        this.queue.once('next', () => resolve());
      });
    }
    this.ac = null;

    this.log.info('EventDispatcher stopped');
  }

  getStats(): DispatcherStats {
    let handlerCount = 0;
    for (const list of this.handlers.values()) handlerCount += list.length;

    return {
      running: this.running,
      queue_size: this.queue.size,
      events_received: this.eventsReceived,
      events_processed: this.eventsProcessed,
      events_failed: this.eventsFailed,
      events_dropped: this.eventsDropped,
      handlers_registered: handlerCount,
      history_size: this.history.length,
    };
  }

  /** Most recent processed events, oldest first. */
  getRecentEvents(limit: number = 10, type?: EventType): EventRecord[] {
    if (limit <= 0) return [];
    const events = type === undefined
      ? this.history
      : this.history.filter((e) => e.type === type);
    return events.slice(-limit).map(toEventRecord);
  }

  get historySize(): number {
    return this.history.length;
  }

  private enqueue(event: AgentEvent): boolean {
    if (event.processed) {
      this.log.warn({ event_id: event.id }, 'Event already processed, not re-enqueuing');
      return false;
    }
    if (this.queued.has(event)) {
      this.log.warn({ event_id: event.id }, 'Event already queued, not enqueuing again');
      return false;
    }
    if (this.queue.size >= this.maxQueueSize) {
      this.eventsDropped++;
      this.log.warn(
        { event_id: event.id, event_type: event.type, queue_size: this.queue.size },
        'Event queue full, dropping event',
      );
      return false;
    }

    event.received_at = this.isoNow();
    this.queued.add(event);
    // p-queue serves higher numbers first; CRITICAL is the lowest value.
    this.queue.add(async () => {
      this.queued.delete(event);
      await this.processEvent(event, this.ac?.signal);
    }, { priority: -event.priority }).catch((err: unknown) => {
      this.log.error({ err, event_id: event.id, event_type: event.type }, 'Event processing failed');
    });

    this.log.debug(
      { event_id: event.id, event_type: event.type, priority: priorityName(event.priority) },
      'Event queued',
    );
    return true;
  }

  private async processEvent(event: AgentEvent, signal?: AbortSignal): Promise<string> {
    // Dispatched while it was still queued; the queued run is a no-op.
    if (event.processed) return event.result;

    const handlers = [...(this.handlers.get(event.type) ?? [])];
    event.processing_started = this.isoNow();

    if (handlers.length === 0) {
      const fields = { event_type: event.type, event_id: event.id };
      if (SYSTEM_EVENT_TYPES.has(event.type)) this.log.debug(fields, 'No handlers for event type');
      else this.log.warn(fields, 'No handlers for event type');
      this.complete(event, NO_HANDLERS);
      return NO_HANDLERS;
    }

    const results: string[] = [];

    for (const handler of handlers) {
      const name = handlerName(handler);
      try {
        const result = await withTimeout(
          (handlerSignal) => handler(event, handlerSignal),
          this.handlerTimeoutMs,
          signal,
        );
        results.push(result);
        this.log.debug(
          { event_id: event.id, handler: name, result: result.slice(0, 100) },
          'Handler completed',
        );
      } catch (err: unknown) {
        const message = err instanceof TimeoutError
          ? `Handler ${name} timed out`
          : `Handler ${name} failed: ${errorMessage(err)}`;
        event.error = message;
        this.eventsFailed++;
        this.log.error({ err, event_id: event.id, event_type: event.type, handler: name }, message);
      }
    }

    this.complete(event, results.filter((r) => r !== '').join(RESULT_SEPARATOR));
    return event.result;
  }

  private complete(event: AgentEvent, result: string): void {
    event.processing_completed = this.isoNow();
    event.processed = true;
    event.result = result;

    if (!this.internal.has(event)) this.eventsProcessed++;

    this.history.push(event);
    if (this.history.length > this.maxHistory) {
      this.history.splice(0, this.history.length - this.maxHistory);
    }
  }

  private isoNow(): string {
    return new Date(this.nowFn()).toISOString();
  }
}

function handlerName(handler: EventHandler): string {
  return handler.name !== '' ? handler.name : 'anonymous';
}
