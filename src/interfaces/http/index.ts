export { default as agentPlugin } from './agent-plugin.js';
export type { AgentPluginOptions, AgentContext, ServerCounters } from './agent-plugin.js';
export { default as webhookRoutes } from './webhook-routes.js';
export { default as statusRoutes } from './status-routes.js';
export { buildWebhookServer, WebhookServerComponent } from './webhook-server.js';
export type { WebhookServerComponentOptions } from './webhook-server.js';
