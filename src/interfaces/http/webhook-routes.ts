import { timingSafeEqual } from 'node:crypto';
import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  customEvent,
  customEventSchema,
  mentionEvent,
  mentionPayloadSchema,
  musicReleaseEvent,
  musicReleasePayloadSchema,
  trendEvent,
  trendPayloadSchema,
} from '../../application/index.js';
import { priorityName } from '../../domain/index.js';
import type { AgentEvent } from '../../domain/index.js';

function secretMatches(expected: string, provided: string | string[] | undefined): boolean {
  if (typeof provided !== 'string') return false;
  const a = Buffer.from(expected);
  const b = Buffer.from(provided);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Webhook ingress routes.
 *
 * POST /webhooks/x/mentions     X mention, reply or quote
 * POST /webhooks/x/trends       trending topic alert
 * POST /webhooks/music/release  music platform release
 * POST /webhooks/custom         generic event, optional shared secret
 *
 * Accepted payloads are queued on the dispatcher and answered with 202;
 * processing happens on the dispatcher queue.
 */
async function webhookRoutes(fastify: FastifyInstance): Promise<void> {
  const { counters } = fastify.agent;

  function queue(event: AgentEvent): void {
    fastify.agent.dispatcher.emit(event);
    counters.events_emitted++;
  }

  fastify.post(
    '/webhooks/x/mentions',
    async (request: FastifyRequest, reply: FastifyReply) => {
      counters.requests_received++;
      const parsed = mentionPayloadSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const event = mentionEvent(parsed.data);
      queue(event);

      request.log.info(
        { username: parsed.data.username, event_type: event.type, event_id: event.id },
        'Mention webhook received',
      );

      return reply.status(202).send({
        status: 'queued',
        event_id: event.id,
        event_type: event.type,
        priority: priorityName(event.priority),
      });
    },
  );

  fastify.post(
    '/webhooks/x/trends',
    async (request: FastifyRequest, reply: FastifyReply) => {
      counters.requests_received++;
      const parsed = trendPayloadSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const event = trendEvent(parsed.data);
      if (event === null) {
        return reply.status(200).send({
          status: 'ignored',
          reason: 'relevance_score too low',
          score: parsed.data.relevance_score,
        });
      }

      queue(event);
      request.log.info(
        { trend: parsed.data.trend_name, relevance: parsed.data.relevance_score },
        'Trend webhook received',
      );

      return reply.status(202).send({
        status: 'queued',
        event_id: event.id,
        trend: parsed.data.trend_name,
      });
    },
  );

  fastify.post(
    '/webhooks/music/release',
    async (request: FastifyRequest, reply: FastifyReply) => {
      counters.requests_received++;
      const parsed = musicReleasePayloadSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const event = musicReleaseEvent(parsed.data);
      queue(event);
      request.log.info(
        { track: parsed.data.track_name, platform: parsed.data.platform },
        'Music release webhook received',
      );

      return reply.status(202).send({
        status: 'queued',
        event_id: event.id,
      });
    },
  );

  fastify.post(
    '/webhooks/custom',
    async (request: FastifyRequest, reply: FastifyReply) => {
      counters.requests_received++;

      const secret = fastify.agent.webhookSecret;
      if (secret !== '' && !secretMatches(secret, request.headers['x-webhook-secret'])) {
        return reply.status(401).send({ error: 'Invalid webhook secret' });
      }

      const parsed = customEventSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const event = customEvent(parsed.data);
      queue(event);
      request.log.info(
        { event_type: parsed.data.event_type, source: parsed.data.source },
        'Custom webhook received',
      );

      return reply.status(202).send({
        status: 'queued',
        event_id: event.id,
        event_type: event.type,
      });
    },
  );
}

export default fp(webhookRoutes, {
  name: 'webhook-routes',
  dependencies: ['agent'],
  fastify: '5.x',
});
