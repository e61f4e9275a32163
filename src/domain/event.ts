import { randomUUID } from 'node:crypto';

/**
 * Core domain types for the agent's event model.
 *
 * These types define the canonical shape of an event as it flows
 * from producers (webhooks, stream listeners, the daemon) through the
 * dispatcher to handlers. They carry no framework dependencies.
 */

export const EventType = {
  // Social interactions
  MENTION: 'mention',
  REPLY: 'reply',
  QUOTE: 'quote',
  LIKE: 'like',
  FOLLOW: 'follow',
  DM: 'dm',

  // Content triggers
  TRENDING_TOPIC: 'trending',
  VIRAL_CONTENT: 'viral',
  SCHEDULED_POST: 'scheduled',

  // External triggers
  WEBHOOK: 'webhook',
  MUSIC_RELEASE: 'music_release',
  COLLAB_REQUEST: 'collab',

  // System
  HEARTBEAT: 'heartbeat',
  ERROR: 'error',
  STARTUP: 'startup',
  SHUTDOWN: 'shutdown',
} as const;

export type EventType = (typeof EventType)[keyof typeof EventType];

export const EVENT_TYPES: readonly EventType[] = Object.values(EventType);

const EVENT_TYPE_VALUES: ReadonlySet<string> = new Set(EVENT_TYPES);

/** Lower value = served first. */
export const EventPriority = {
  CRITICAL: 1,
  HIGH: 2,
  NORMAL: 3,
  LOW: 4,
} as const;

export type EventPriority = (typeof EventPriority)[keyof typeof EventPriority];

export type PriorityName = keyof typeof EventPriority;

/** Open key/value map attached to every event. */
export type EventMetadata = Record<string, unknown>;

/**
 * Canonical event entity.
 *
 * The producer-facing fields are readonly. The processing fields are
 * written only by the dispatcher; once `processed` is true the event is
 * final and never re-enqueued.
 */
export interface AgentEvent {
  readonly id: string;
  readonly type: EventType;
  readonly priority: EventPriority;
  readonly source: string;
  readonly source_id: string;
  readonly user_id: string;
  readonly user_name: string;
  readonly content: string;
  readonly metadata: EventMetadata;
  readonly created_at: string; // ISO-8601
  received_at: string; // ISO-8601, restamped on emit

  processed: boolean;
  processing_started: string | null;
  processing_completed: string | null;
  result: string;
  error: string;
}

/** Fields a producer may set. Only `type` is required. */
export interface EventInit {
  id?: string;
  type: EventType;
  priority?: EventPriority;
  source?: string;
  source_id?: string;
  user_id?: string;
  user_name?: string;
  content?: string;
  metadata?: EventMetadata;
  created_at?: string;
}

/** JSON-safe snapshot used by history queries and HTTP responses. */
export interface EventRecord {
  id: string;
  type: EventType;
  priority: EventPriority;
  source: string;
  source_id: string;
  user_id: string;
  user_name: string;
  content: string;
  created_at: string;
  received_at: string;
  processed: boolean;
  result: string;
  error: string;
}

const CONTENT_PREVIEW_LENGTH = 200;

export function createEvent(init: EventInit): AgentEvent {
  const now = new Date().toISOString();
  return {
    id: init.id ?? randomUUID(),
    type: init.type,
    priority: init.priority ?? EventPriority.NORMAL,
    source: init.source ?? '',
    source_id: init.source_id ?? '',
    user_id: init.user_id ?? '',
    user_name: init.user_name ?? '',
    content: init.content ?? '',
    metadata: init.metadata ?? {},
    created_at: init.created_at ?? now,
    received_at: now,
    processed: false,
    processing_started: null,
    processing_completed: null,
    result: '',
    error: '',
  };
}

export function toEventRecord(event: AgentEvent): EventRecord {
  const content = event.content.length > CONTENT_PREVIEW_LENGTH
    ? `${event.content.slice(0, CONTENT_PREVIEW_LENGTH)}...`
    : event.content;

  return {
    id: event.id,
    type: event.type,
    priority: event.priority,
    source: event.source,
    source_id: event.source_id,
    user_id: event.user_id,
    user_name: event.user_name,
    content,
    created_at: event.created_at,
    received_at: event.received_at,
    processed: event.processed,
    result: event.result,
    error: event.error,
  };
}

export function isEventType(value: unknown): value is EventType {
  return typeof value === 'string' && EVENT_TYPE_VALUES.has(value);
}

export function isEventPriority(value: unknown): value is EventPriority {
  return value === 1 || value === 2 || value === 3 || value === 4;
}

/**
 * Rebuilds a fresh (unprocessed) event from a loosely-typed record.
 * Unknown types fall back to heartbeat, unknown priorities to NORMAL.
 */
export function eventFromRecord(data: Record<string, unknown>): AgentEvent {
  const str = (key: string): string | undefined => {
    const value = data[key];
    return typeof value === 'string' ? value : undefined;
  };
  const metadata = data['metadata'];

  return createEvent({
    id: str('id'),
    type: isEventType(data['type']) ? data['type'] : EventType.HEARTBEAT,
    priority: isEventPriority(data['priority']) ? data['priority'] : EventPriority.NORMAL,
    source: str('source'),
    source_id: str('source_id'),
    user_id: str('user_id'),
    user_name: str('user_name'),
    content: str('content'),
    metadata: typeof metadata === 'object' && metadata !== null && !Array.isArray(metadata)
      ? { ...metadata }
      : {},
    created_at: str('created_at'),
  });
}

/** Case-insensitive priority lookup; anything unrecognised is NORMAL. */
export function priorityFromString(value: string): EventPriority {
  switch (value.toLowerCase()) {
    case 'critical': return EventPriority.CRITICAL;
    case 'high':     return EventPriority.HIGH;
    case 'low':      return EventPriority.LOW;
    default:         return EventPriority.NORMAL;
  }
}

export function priorityName(priority: EventPriority): PriorityName {
  switch (priority) {
    case EventPriority.CRITICAL: return 'CRITICAL';
    case EventPriority.HIGH:     return 'HIGH';
    case EventPriority.NORMAL:   return 'NORMAL';
    case EventPriority.LOW:      return 'LOW';
  }
}
