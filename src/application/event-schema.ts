import { z } from 'zod';

const metadataSchema = z.record(z.string(), z.unknown()).default({});

/**
 * X mention notification.
 *
 * `in_reply_to` marks a reply, `is_quote` a quote post; neither means a
 * plain mention.
 */
export const mentionPayloadSchema = z.object({
  tweet_id: z.string().min(1),
  user_id: z.string().min(1),
  username: z.string().min(1),
  display_name: z.string().default(''),
  text: z.string(),
  created_at: z.string().default(''),
  in_reply_to: z.string().nullable().optional(),
  is_quote: z.boolean().default(false),
  follower_count: z.number().int().nonnegative().default(0),
  metadata: metadataSchema,
});

export type MentionPayload = z.infer<typeof mentionPayloadSchema>;

export const trendPayloadSchema = z.object({
  trend_name: z.string().min(1),
  volume: z.number().int().nonnegative().default(0),
  location: z.string().default('worldwide'),
  category: z.string().default('music'),
  relevance_score: z.number().min(0).max(1).default(0),
  suggested_content: z.string().default(''),
});

export type TrendPayload = z.infer<typeof trendPayloadSchema>;

export const musicReleasePayloadSchema = z.object({
  platform: z.string().min(1),
  track_id: z.string().min(1),
  track_name: z.string().default(''),
  artist_name: z.string().default(''),
  release_type: z.string().default('track'),
  url: z.string().default(''),
});

export type MusicReleasePayload = z.infer<typeof musicReleasePayloadSchema>;

/**
 * Generic inbound event, shared by the custom webhook and the Redis
 * subscriber. `event_type` stays a free string here: unknown values are
 * mapped to `webhook` by the caller, not rejected.
 */
export const customEventSchema = z.object({
  event_type: z.string().min(1).max(255),
  source: z.string().max(255).default('webhook'),
  source_id: z.string().default(''),
  user_id: z.string().default(''),
  user_name: z.string().default(''),
  content: z.string().default(''),
  metadata: metadataSchema,
  priority: z.string().default('normal'),
});

export type CustomEventPayload = z.infer<typeof customEventSchema>;

/** Query string of GET /events/recent. */
export const recentEventsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(20),
  event_type: z.string().min(1).optional(),
});

export type RecentEventsQuery = z.infer<typeof recentEventsQuerySchema>;
