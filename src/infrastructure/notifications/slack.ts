import type { Logger } from 'pino';
import type { EventHandler } from '../../application/index.js';
import type { AgentEvent } from '../../domain/index.js';
import { priorityName } from '../../domain/index.js';
import type { AgentConfig } from '../config.js';

export type SlackConfig = AgentConfig['slack'];

export function formatSlackAlert(event: AgentEvent): string {
  const component = event.metadata['component'];
  const lines = [
    `*[${priorityName(event.priority)}]* Agent alert from \`${event.source || 'unknown'}\``,
    `>${event.content}`,
  ];
  if (typeof component === 'string') lines.push(`Component: \`${component}\``);
  lines.push(`Raised: ${event.created_at}`);
  return lines.join('\n');
}

/**
 * ERROR handler posting to a Slack incoming webhook.
 *
 * Skips with a debug log when disabled, warns on a non-OK response or a
 * network failure, and never throws, so alerting cannot fail the event.
 */
export function createSlackAlertHandler(config: SlackConfig, log: Logger): EventHandler {
  return async function slackAlert(event: AgentEvent, signal: AbortSignal): Promise<string> {
    if (!config.enabled) {
      log.debug({ event_id: event.id }, 'Slack alert skipped (disabled)');
      return 'slack disabled';
    }

    if (!config.webhook_url) {
      log.warn('Slack enabled but webhook_url is empty, skipping');
      return 'slack not configured';
    }

    try {
      const response = await fetch(config.webhook_url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ text: formatSlackAlert(event) }),
        signal,
      });

      if (response.ok) {
        log.info({ event_id: event.id }, 'Slack alert sent');
        return 'slack alert sent';
      }
      log.warn({ status: response.status, event_id: event.id }, 'Slack webhook returned non-OK status');
      return `slack returned ${response.status}`;
    } catch (err: unknown) {
      log.warn({ err, event_id: event.id }, 'Failed to send Slack alert');
      return 'slack alert failed';
    }
  };
}
