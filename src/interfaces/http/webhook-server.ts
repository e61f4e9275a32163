import { fastify } from 'fastify';
import type { FastifyInstance, FastifyServerOptions } from 'fastify';
import type { Logger } from 'pino';
import type { SupervisedComponent } from '../../domain/index.js';
import agentPlugin from './agent-plugin.js';
import type { AgentPluginOptions } from './agent-plugin.js';
import webhookRoutes from './webhook-routes.js';
import statusRoutes from './status-routes.js';

/**
 * Builds the webhook/status server without listening.
 *
 * Order:
 * 1) agent decoration
 * 2) webhook ingress routes
 * 3) operational routes
 */
export async function buildWebhookServer(
  deps: AgentPluginOptions,
  serverOptions: FastifyServerOptions = {},
): Promise<FastifyInstance> {
  const app = fastify(serverOptions);

  await app.register(agentPlugin, deps);
  await app.register(webhookRoutes);
  await app.register(statusRoutes);

  return app;
}

export interface WebhookServerComponentOptions {
  deps: AgentPluginOptions;
  host: string;
  port: number;
  log: Logger;
  serverOptions?: FastifyServerOptions;
}

/**
 * The webhook server as a supervised component. A Fastify instance
 * cannot listen again once closed, so every start builds a fresh one.
 */
export class WebhookServerComponent implements SupervisedComponent {
  private readonly options: WebhookServerComponentOptions;
  private app: FastifyInstance | null = null;

  constructor(options: WebhookServerComponentOptions) {
    this.options = options;
  }

  async start(): Promise<boolean> {
    const { deps, host, port, log, serverOptions } = this.options;
    const app = await buildWebhookServer(deps, serverOptions);

    try {
      const address = await app.listen({ host, port });
      this.app = app;
      log.info({ address }, 'Webhook server listening');
      return true;
    } catch (err: unknown) {
      log.error({ err, host, port }, 'Webhook server failed to listen');
      await app.close();
      return false;
    }
  }

  async stop(): Promise<void> {
    const app = this.app;
    if (app === null) return;
    this.app = null;
    await app.close();
    this.options.log.info('Webhook server closed');
  }

  async healthCheck(): Promise<boolean> {
    return this.app?.server.listening ?? false;
  }
}
