/**
 * Webhook Store - tenant-owned delivery targets
 */

import { randomBytes } from 'crypto';
import { z } from 'zod';
import type { Database, Row } from '../db/index';
import { readBoolean, readJson, readNumber, readOptionalNumber, readString } from '../db/rows';
import { NotFoundError, ValidationError } from '../infra/errors';
import { generateId } from '../utils/id';
import { systemClock, type Clock } from '../utils/clock';
import { createLogger } from '../utils/logger';
import type { Webhook } from './types';

const logger = createLogger('webhook-store');

export const WILDCARD_EVENT = '*';

const webhookInputSchema = z.object({
  tenantId: z.string().min(1),
  name: z.string().trim().min(3).max(255),
  url: z
    .string()
    .url()
    .max(2048)
    .refine((value) => /^https?:\/\//i.test(value), 'url must use http or https'),
  events: z.array(z.string().trim().min(1)).min(1, 'subscribe to at least one event'),
  enabled: z.boolean().default(true),
});

export type CreateWebhookInput = z.input<typeof webhookInputSchema>;

const storedEventsSchema = z.array(z.string());

export interface WebhookStore {
  /** Persist a new webhook with a freshly generated secret. */
  create(input: CreateWebhookInput): Webhook;
  get(tenantId: string, webhookId: string): Webhook | undefined;
  /** Lookup without tenant scope, for the delivery worker only. */
  getById(webhookId: string): Webhook | undefined;
  listByTenant(tenantId: string): Webhook[];
  /** Enabled webhooks of a tenant subscribed to `eventType` (or to '*'). */
  listForEvent(tenantId: string, eventType: string): Webhook[];
  setEnabled(tenantId: string, webhookId: string, enabled: boolean): Webhook;
  /** Replace the signing secret; returns the new one. */
  rotateSecret(tenantId: string, webhookId: string): string;
  delete(tenantId: string, webhookId: string): void;
  updateLastTriggered(webhookId: string, at: number): void;
}

export function generateSecret(bytes = 32): string {
  return randomBytes(bytes).toString('hex');
}

function parseWebhookRow(row: Row): Webhook {
  const events = storedEventsSchema.safeParse(readJson(row, 'events'));
  return {
    id: readString(row, 'id'),
    tenantId: readString(row, 'tenant_id'),
    name: readString(row, 'name'),
    url: readString(row, 'url'),
    secret: readString(row, 'secret'),
    events: events.success ? events.data : [],
    enabled: readBoolean(row, 'enabled'),
    lastTriggeredAt: readOptionalNumber(row, 'last_triggered_at'),
    createdAt: readNumber(row, 'created_at'),
    updatedAt: readNumber(row, 'updated_at'),
  };
}

const COLUMNS = 'id, tenant_id, name, url, secret, events, enabled, last_triggered_at, created_at, updated_at';

export function createWebhookStore(db: Database, options: { now?: Clock } = {}): WebhookStore {
  const now = options.now ?? systemClock;

  function requireWebhook(tenantId: string, webhookId: string): Webhook {
    const webhook = store.get(tenantId, webhookId);
    if (!webhook) throw new NotFoundError('webhook', webhookId);
    return webhook;
  }

  const store: WebhookStore = {
    create(input) {
      const parsed = webhookInputSchema.safeParse(input);
      if (!parsed.success) {
        throw new ValidationError(
          'Invalid webhook',
          parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
        );
      }

      const timestamp = now();
      const webhook: Webhook = {
        id: generateId('wh'),
        tenantId: parsed.data.tenantId,
        name: parsed.data.name,
        url: parsed.data.url,
        secret: generateSecret(),
        events: [...new Set(parsed.data.events)],
        enabled: parsed.data.enabled,
        lastTriggeredAt: null,
        createdAt: timestamp,
        updatedAt: timestamp,
      };

      db.run(`INSERT INTO webhooks (${COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`, [
        webhook.id,
        webhook.tenantId,
        webhook.name,
        webhook.url,
        webhook.secret,
        JSON.stringify(webhook.events),
        webhook.enabled ? 1 : 0,
        null,
        webhook.createdAt,
        webhook.updatedAt,
      ]);

      logger.info({ webhookId: webhook.id, tenantId: webhook.tenantId, events: webhook.events }, 'Webhook created');
      return webhook;
    },

    get(tenantId, webhookId) {
      const rows = db.query(`SELECT ${COLUMNS} FROM webhooks WHERE id = ? AND tenant_id = ?`, [webhookId, tenantId]);
      return rows.length > 0 ? parseWebhookRow(rows[0]) : undefined;
    },

    getById(webhookId) {
      const rows = db.query(`SELECT ${COLUMNS} FROM webhooks WHERE id = ?`, [webhookId]);
      return rows.length > 0 ? parseWebhookRow(rows[0]) : undefined;
    },

    listByTenant(tenantId) {
      return db
        .query(`SELECT ${COLUMNS} FROM webhooks WHERE tenant_id = ? ORDER BY created_at DESC, id`, [tenantId])
        .map(parseWebhookRow);
    },

    listForEvent(tenantId, eventType) {
      return db
        .query(`SELECT ${COLUMNS} FROM webhooks WHERE tenant_id = ? AND enabled = 1 ORDER BY created_at, id`, [
          tenantId,
        ])
        .map(parseWebhookRow)
        .filter((w) => w.events.includes(eventType) || w.events.includes(WILDCARD_EVENT));
    },

    setEnabled(tenantId, webhookId, enabled) {
      const webhook = requireWebhook(tenantId, webhookId);
      const updatedAt = now();
      db.run('UPDATE webhooks SET enabled = ?, updated_at = ? WHERE id = ? AND tenant_id = ?', [
        enabled ? 1 : 0,
        updatedAt,
        webhookId,
        tenantId,
      ]);
      logger.info({ webhookId, tenantId, enabled }, 'Webhook enabled flag changed');
      return { ...webhook, enabled, updatedAt };
    },

    rotateSecret(tenantId, webhookId) {
      requireWebhook(tenantId, webhookId);
      const secret = generateSecret();
      db.run('UPDATE webhooks SET secret = ?, updated_at = ? WHERE id = ? AND tenant_id = ?', [
        secret,
        now(),
        webhookId,
        tenantId,
      ]);
      logger.info({ webhookId, tenantId }, 'Webhook secret rotated');
      return secret;
    },

    delete(tenantId, webhookId) {
      const { changes } = db.run('DELETE FROM webhooks WHERE id = ? AND tenant_id = ?', [webhookId, tenantId]);
      if (changes === 0) throw new NotFoundError('webhook', webhookId);
      logger.info({ webhookId, tenantId }, 'Webhook deleted');
    },

    updateLastTriggered(webhookId, at) {
      db.run('UPDATE webhooks SET last_triggered_at = ? WHERE id = ?', [at, webhookId]);
    },
  };

  return store;
}
