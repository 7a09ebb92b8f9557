import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createMemoryDatabase, type Database } from '../db/index';
import { createEventPublisher, type EventPublisher } from './events';
import { createDeliveryQueueStore, type DeliveryQueueStore } from './queue';
import { createWebhookStore, type WebhookStore } from './store';

const NOW = 1_700_000_000_000;

describe('EventPublisher', () => {
  let db: Database;
  let webhooks: WebhookStore;
  let queue: DeliveryQueueStore;
  let events: EventPublisher;

  beforeEach(async () => {
    db = await createMemoryDatabase();
    webhooks = createWebhookStore(db, { now: () => NOW });
    queue = createDeliveryQueueStore(db, { now: () => NOW });
    events = createEventPublisher({ webhooks, queue, now: () => NOW, maxAttempts: 3 });
  });

  afterEach(() => {
    db.close();
  });

  it('enqueues one delivery per subscribed webhook', () => {
    const subscribed = webhooks.create({
      tenantId: 'tenant-1',
      name: 'Billing hook',
      url: 'https://hooks.example.com/billing',
      events: ['invoice.paid'],
    });
    webhooks.create({
      tenantId: 'tenant-1',
      name: 'Alerts hook',
      url: 'https://hooks.example.com/alerts',
      events: ['alert.triggered'],
    });

    const ids = events.publish('tenant-1', 'invoice.paid', { invoiceId: 'inv_1', amount: 42 });

    expect(ids).toHaveLength(1);
    const entry = queue.get(ids[0]);
    expect(entry?.webhookId).toBe(subscribed.id);
    expect(entry?.maxAttempts).toBe(3);
    expect(entry?.payload).toBe(
      JSON.stringify({
        type: 'invoice.paid',
        tenant_id: 'tenant-1',
        timestamp: new Date(NOW).toISOString(),
        data: { invoiceId: 'inv_1', amount: 42 },
      }),
    );
  });

  it('returns no ids when nothing is subscribed', () => {
    expect(events.publish('tenant-1', 'invoice.paid', {})).toEqual([]);
    expect(queue.countByStatus().pending).toBe(0);
  });
});
