import type { Logger } from 'pino';
import { EventType } from '../domain/index.js';
import type { AgentEvent } from '../domain/index.js';
import type { EventDispatcher, EventHandler } from './event-dispatcher.js';

/** Event types acknowledged by the built-in handler until a platform adapter takes over. */
export const ACKNOWLEDGED_EVENT_TYPES: readonly EventType[] = [
  EventType.MENTION,
  EventType.REPLY,
  EventType.QUOTE,
  EventType.DM,
  EventType.FOLLOW,
  EventType.LIKE,
  EventType.TRENDING_TOPIC,
  EventType.VIRAL_CONTENT,
  EventType.SCHEDULED_POST,
  EventType.WEBHOOK,
  EventType.MUSIC_RELEASE,
  EventType.COLLAB_REQUEST,
];

/**
 * Logs the event and reports it as acknowledged. Response generation
 * lives outside this process.
 */
export function createAcknowledgeHandler(log: Logger): EventHandler {
  return async function acknowledge(event: AgentEvent): Promise<string> {
    log.info(
      {
        event_id: event.id,
        event_type: event.type,
        source: event.source,
        user_name: event.user_name,
        content: event.content.slice(0, 50),
      },
      'Event acknowledged',
    );
    return `acknowledged ${event.type} from ${event.user_name || event.source || 'unknown'}`;
  };
}

/** Registers one acknowledge handler for every type in `types`. */
export function registerDefaultHandlers(
  dispatcher: EventDispatcher,
  log: Logger,
  types: readonly EventType[] = ACKNOWLEDGED_EVENT_TYPES,
): void {
  const handler = createAcknowledgeHandler(log);
  for (const type of types) {
    dispatcher.registerHandler(type, handler);
  }
}
