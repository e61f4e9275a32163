import {
  EventPriority,
  EventType,
  createEvent,
  isEventType,
  priorityFromString,
} from '../domain/index.js';
import type { AgentEvent } from '../domain/index.js';
import type {
  CustomEventPayload,
  MentionPayload,
  MusicReleasePayload,
  TrendPayload,
} from './event-schema.js';

/** Followers above which a mention jumps the queue. */
export const INFLUENCER_FOLLOWER_THRESHOLD = 10_000;
/** Trends scoring below this are not worth an event. */
export const MIN_TREND_RELEVANCE = 0.5;
const HIGH_TREND_RELEVANCE = 0.8;

export function mentionEvent(payload: MentionPayload): AgentEvent {
  let type: EventType = EventType.MENTION;
  if (payload.is_quote) type = EventType.QUOTE;
  else if (payload.in_reply_to) type = EventType.REPLY;

  return createEvent({
    type,
    priority: payload.follower_count > INFLUENCER_FOLLOWER_THRESHOLD
      ? EventPriority.CRITICAL
      : EventPriority.HIGH,
    source: 'x_twitter',
    source_id: payload.tweet_id,
    user_id: payload.user_id,
    user_name: payload.username,
    content: payload.text,
    metadata: {
      ...payload.metadata,
      display_name: payload.display_name,
      in_reply_to: payload.in_reply_to ?? null,
      is_quote: payload.is_quote,
      follower_count: payload.follower_count,
      tweet_created_at: payload.created_at,
    },
  });
}

/** Returns null for trends below the relevance floor. */
export function trendEvent(payload: TrendPayload): AgentEvent | null {
  if (payload.relevance_score < MIN_TREND_RELEVANCE) return null;

  return createEvent({
    type: EventType.TRENDING_TOPIC,
    priority: payload.relevance_score < HIGH_TREND_RELEVANCE
      ? EventPriority.NORMAL
      : EventPriority.HIGH,
    source: 'x_trends',
    source_id: payload.trend_name,
    content: payload.suggested_content || `Trending: ${payload.trend_name}`,
    metadata: {
      trend_name: payload.trend_name,
      volume: payload.volume,
      location: payload.location,
      category: payload.category,
      relevance_score: payload.relevance_score,
    },
  });
}

export function musicReleaseEvent(payload: MusicReleasePayload): AgentEvent {
  return createEvent({
    type: EventType.MUSIC_RELEASE,
    priority: EventPriority.HIGH,
    source: payload.platform,
    source_id: payload.track_id,
    content: `New ${payload.release_type}: ${payload.track_name} by ${payload.artist_name}`,
    metadata: {
      platform: payload.platform,
      track_name: payload.track_name,
      artist_name: payload.artist_name,
      release_type: payload.release_type,
      url: payload.url,
    },
  });
}

/** Unknown event types become `webhook`; unknown priorities NORMAL. */
export function customEvent(payload: CustomEventPayload): AgentEvent {
  return createEvent({
    type: isEventType(payload.event_type) ? payload.event_type : EventType.WEBHOOK,
    priority: priorityFromString(payload.priority),
    source: payload.source,
    source_id: payload.source_id,
    user_id: payload.user_id,
    user_name: payload.user_name,
    content: payload.content,
    metadata: payload.metadata,
  });
}
