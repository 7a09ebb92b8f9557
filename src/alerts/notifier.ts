/**
 * Notifier - turns a triggered alert into queued webhook deliveries
 *
 * The notifier never performs HTTP itself. Each webhook channel becomes one
 * delivery queue entry; the delivery worker owns retries from there.
 */

import { NotificationError, errorMessage } from '../infra/errors';
import { buildEnvelope } from '../webhooks/events';
import type { DeliveryQueueStore } from '../webhooks/queue';
import type { WebhookStore } from '../webhooks/store';
import { systemClock, type Clock } from '../utils/clock';
import { createLogger } from '../utils/logger';
import type {
  Alert,
  AlertHistory,
  Channel,
  ChannelResult,
  EvaluationMetadata,
  NotificationReport,
  Severity,
} from './types';

const logger = createLogger('notifier');

export const ALERT_TRIGGERED_EVENT = 'alert.triggered';

// =============================================================================
// TYPES
// =============================================================================

/** `data` of an alert.triggered webhook body */
export interface AlertTriggeredData {
  alert: { id: string; name: string; severity: Severity };
  history: { id: string; triggered_at: string; metadata: EvaluationMetadata };
}

export interface NotifierDeps {
  webhooks: WebhookStore;
  queue: DeliveryQueueStore;
  now?: Clock;
  maxAttempts?: number;
}

export interface Notifier {
  /**
   * Enqueue a delivery for every channel of the alert. Rejects with
   * NotificationError, carrying the full report, when any channel failed
   * after trying all of them.
   */
  send(alert: Alert, history: AlertHistory): Promise<NotificationReport>;
}

// =============================================================================
// IMPLEMENTATION
// =============================================================================

export function createNotifier(deps: NotifierDeps): Notifier {
  const now = deps.now ?? systemClock;

  function sendToChannel(alert: Alert, history: AlertHistory, channel: Channel): ChannelResult {
    if (channel.type !== 'webhook') {
      return { channel, ok: false, error: `unsupported channel type: ${channel.declaredType}` };
    }

    const webhook = deps.webhooks.get(alert.tenantId, channel.webhookId);
    if (!webhook) {
      return { channel, ok: false, error: `webhook ${channel.webhookId} not found` };
    }
    if (!webhook.enabled) {
      return { channel, ok: false, error: `webhook ${channel.webhookId} is disabled` };
    }

    const data: AlertTriggeredData = {
      alert: { id: alert.id, name: alert.name, severity: alert.severity },
      history: {
        id: history.id,
        triggered_at: new Date(history.triggeredAt).toISOString(),
        metadata: history.metadata,
      },
    };

    try {
      const entry = deps.queue.enqueue({
        webhookId: webhook.id,
        tenantId: alert.tenantId,
        eventType: ALERT_TRIGGERED_EVENT,
        payload: buildEnvelope(alert.tenantId, ALERT_TRIGGERED_EVENT, data, now()),
        maxAttempts: deps.maxAttempts,
      });
      return { channel, ok: true, entryId: entry.id };
    } catch (err) {
      return { channel, ok: false, error: errorMessage(err) };
    }
  }

  return {
    async send(alert, history) {
      const results = alert.channels.map((channel) => sendToChannel(alert, history, channel));
      const failures = results.filter((r) => !r.ok);

      for (const result of results) {
        if (!result.ok) {
          logger.warn(
            { alertId: alert.id, tenantId: alert.tenantId, channel: result.channel.type, error: result.error },
            'Notification channel failed',
          );
        }
      }

      const report: NotificationReport = { total: results.length, failed: failures.length, results };
      if (report.failed > 0) {
        throw new NotificationError(report);
      }

      logger.info({ alertId: alert.id, tenantId: alert.tenantId, channels: report.total }, 'Alert notifications queued');
      return report;
    },
  };
}
