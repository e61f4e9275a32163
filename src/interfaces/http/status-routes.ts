import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { recentEventsQuerySchema } from '../../application/index.js';
import { isEventType } from '../../domain/index.js';
import type { EventType } from '../../domain/index.js';

/**
 * Read-only operational routes.
 *
 * GET /health         aggregated daemon health, 503 when unhealthy
 * GET /stats          dispatcher counters plus this server's counters
 * GET /events/recent  processed event history, optionally by type
 * GET /status         full daemon status snapshot
 */
async function statusRoutes(fastify: FastifyInstance): Promise<void> {
  const agent = fastify.agent;

  function uptimeSeconds(): number {
    return Math.max(0, (agent.nowFn() - agent.startedAt) / 1000);
  }

  fastify.get(
    '/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const status = agent.daemon.getHealth();

      return reply.status(status === 'unhealthy' ? 503 : 200).send({
        status,
        timestamp: new Date(agent.nowFn()).toISOString(),
        uptime_seconds: uptimeSeconds(),
        version: agent.version,
      });
    },
  );

  fastify.get(
    '/stats',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.status(200).send({
        dispatcher: agent.dispatcher.getStats(),
        server: {
          uptime_seconds: uptimeSeconds(),
          requests_received: agent.counters.requests_received,
          events_emitted: agent.counters.events_emitted,
        },
      });
    },
  );

  fastify.get(
    '/events/recent',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = recentEventsQuerySchema.safeParse(request.query);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const { limit, event_type: rawType } = parsed.data;
      let eventType: EventType | undefined;
      if (rawType !== undefined) {
        if (!isEventType(rawType)) {
          return reply.status(400).send({ error: `Invalid event_type: ${rawType}` });
        }
        eventType = rawType;
      }

      return reply.status(200).send({
        events: agent.dispatcher.getRecentEvents(limit, eventType),
        total_in_history: agent.dispatcher.historySize,
      });
    },
  );

  fastify.get(
    '/status',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.status(200).send(agent.daemon.getStatus());
    },
  );
}

export default fp(statusRoutes, {
  name: 'status-routes',
  dependencies: ['agent'],
  fastify: '5.x',
});
