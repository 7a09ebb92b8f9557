/**
 * Event Publisher - fan an event out to every subscribed webhook of a tenant
 */

import { systemClock, type Clock } from '../utils/clock';
import { createLogger } from '../utils/logger';
import type { DeliveryQueueStore } from './queue';
import type { WebhookStore } from './store';
import type { EventEnvelope } from './types';

const logger = createLogger('event-publisher');

export interface EventPublisherDeps {
  webhooks: WebhookStore;
  queue: DeliveryQueueStore;
  now?: Clock;
  /** Attempts per delivery. Default: the queue's default */
  maxAttempts?: number;
}

export interface EventPublisher {
  /** Enqueue one delivery per subscribed webhook; returns the entry ids. */
  publish<TData>(tenantId: string, eventType: string, data: TData): string[];
}

export function buildEnvelope<TData>(
  tenantId: string,
  eventType: string,
  data: TData,
  at: number,
): EventEnvelope<TData> {
  return {
    type: eventType,
    tenant_id: tenantId,
    timestamp: new Date(at).toISOString(),
    data,
  };
}

export function createEventPublisher(deps: EventPublisherDeps): EventPublisher {
  const now = deps.now ?? systemClock;

  return {
    publish(tenantId, eventType, data) {
      const targets = deps.webhooks.listForEvent(tenantId, eventType);
      if (targets.length === 0) {
        logger.debug({ tenantId, eventType }, 'No webhooks subscribed');
        return [];
      }

      const payload = buildEnvelope(tenantId, eventType, data, now());
      const ids = targets.map(
        (webhook) =>
          deps.queue.enqueue({
            webhookId: webhook.id,
            tenantId,
            eventType,
            payload,
            maxAttempts: deps.maxAttempts,
          }).id,
      );

      logger.info({ tenantId, eventType, deliveries: ids.length }, 'Event published');
      return ids;
    },
  };
}
