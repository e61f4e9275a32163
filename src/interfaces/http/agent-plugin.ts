import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { EventDispatcher, HeartbeatDaemon } from '../../application/index.js';

export interface AgentPluginOptions {
  dispatcher: EventDispatcher;
  daemon: HeartbeatDaemon;
  /** Empty string disables the custom webhook secret check. */
  webhookSecret: string;
  version?: string;
  nowFn?: () => number;
}

export interface ServerCounters {
  requests_received: number;
  events_emitted: number;
}

export interface AgentContext {
  readonly dispatcher: EventDispatcher;
  readonly daemon: HeartbeatDaemon;
  readonly webhookSecret: string;
  readonly version: string;
  readonly startedAt: number;
  readonly nowFn: () => number;
  readonly counters: ServerCounters;
}

/**
 * Decorates `fastify.agent` with the dispatcher, the daemon and the
 * per-server counters, so route plugins never reach for globals.
 */
async function agentPlugin(fastify: FastifyInstance, opts: AgentPluginOptions): Promise<void> {
  const nowFn = opts.nowFn ?? Date.now;

  const context: AgentContext = {
    dispatcher: opts.dispatcher,
    daemon: opts.daemon,
    webhookSecret: opts.webhookSecret,
    version: opts.version ?? '1.0.0',
    startedAt: nowFn(),
    nowFn,
    counters: { requests_received: 0, events_emitted: 0 },
  };

  fastify.decorate('agent', context);
}

export default fp(agentPlugin, {
  name: 'agent',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.agent` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    agent: AgentContext;
  }
}
