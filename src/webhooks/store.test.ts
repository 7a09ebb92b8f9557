import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createMemoryDatabase, type Database } from '../db/index';
import { NotFoundError, ValidationError } from '../infra/errors';
import { createWebhookStore, generateSecret, type WebhookStore } from './store';

const NOW = 1_700_000_000_000;

describe('WebhookStore', () => {
  let db: Database;
  let store: WebhookStore;

  beforeEach(async () => {
    db = await createMemoryDatabase();
    store = createWebhookStore(db, { now: () => NOW });
  });

  afterEach(() => {
    db.close();
  });

  it('creates a webhook with a 64-character hex secret', () => {
    const webhook = store.create({
      tenantId: 'tenant-1',
      name: 'Ops hook',
      url: 'https://hooks.example.com/ops',
      events: ['alert.triggered', 'alert.triggered'],
    });

    expect(webhook.id.startsWith('wh_')).toBe(true);
    expect(webhook.secret).toMatch(/^[0-9a-f]{64}$/);
    expect(webhook.events).toEqual(['alert.triggered']);
    expect(webhook.enabled).toBe(true);
    expect(store.get('tenant-1', webhook.id)).toEqual(webhook);
  });

  it('rejects non-http urls and empty event lists', () => {
    expect(() =>
      store.create({ tenantId: 'tenant-1', name: 'Ops hook', url: 'ftp://files.example.com', events: ['*'] }),
    ).toThrow(ValidationError);
    expect(() =>
      store.create({ tenantId: 'tenant-1', name: 'Ops hook', url: 'https://hooks.example.com', events: [] }),
    ).toThrow('Invalid webhook: events: subscribe to at least one event');
  });

  it('lists only enabled webhooks subscribed to the event or to *', () => {
    const exact = store.create({ tenantId: 't', name: 'Exact', url: 'https://a.example.com', events: ['alert.triggered'] });
    const wildcard = store.create({ tenantId: 't', name: 'Wildcard', url: 'https://b.example.com', events: ['*'] });
    store.create({ tenantId: 't', name: 'Other', url: 'https://c.example.com', events: ['invoice.paid'] });
    const disabled = store.create({ tenantId: 't', name: 'Disabled', url: 'https://d.example.com', events: ['*'] });
    store.setEnabled('t', disabled.id, false);
    store.create({ tenantId: 'other', name: 'Foreign', url: 'https://e.example.com', events: ['*'] });

    expect(store.listForEvent('t', 'alert.triggered').map((w) => w.id).sort()).toEqual([exact.id, wildcard.id].sort());
  });

  it('rotates the secret', () => {
    const webhook = store.create({ tenantId: 't', name: 'Ops hook', url: 'https://a.example.com', events: ['*'] });
    const secret = store.rotateSecret('t', webhook.id);

    expect(secret).not.toBe(webhook.secret);
    expect(store.getById(webhook.id)?.secret).toBe(secret);
  });

  it('scopes mutations to the owning tenant', () => {
    const webhook = store.create({ tenantId: 't', name: 'Ops hook', url: 'https://a.example.com', events: ['*'] });

    expect(() => store.setEnabled('other', webhook.id, false)).toThrow(NotFoundError);
    expect(() => store.delete('other', webhook.id)).toThrow(`webhook ${webhook.id} not found`);
    store.delete('t', webhook.id);
    expect(store.getById(webhook.id)).toBeUndefined();
  });

  it('records the last delivery time', () => {
    const webhook = store.create({ tenantId: 't', name: 'Ops hook', url: 'https://a.example.com', events: ['*'] });
    store.updateLastTriggered(webhook.id, NOW + 10);
    expect(store.getById(webhook.id)?.lastTriggeredAt).toBe(NOW + 10);
  });
});

describe('generateSecret', () => {
  it('returns hex of twice the byte length', () => {
    expect(generateSecret(16)).toMatch(/^[0-9a-f]{32}$/);
  });
});
