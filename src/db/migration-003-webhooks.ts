/**
 * Migration 003 - Webhooks and delivery queue
 *
 * Tenant webhook targets plus the durable queue of delivery attempts.
 * The (status, next_retry_at) index serves the worker's claim query.
 */

export const MIGRATION_003_UP = `
  CREATE TABLE IF NOT EXISTS webhooks (
    id TEXT PRIMARY KEY,
    tenant_id TEXT NOT NULL,
    name TEXT NOT NULL,
    url TEXT NOT NULL,
    secret TEXT NOT NULL,
    events TEXT NOT NULL DEFAULT '[]',
    enabled INTEGER NOT NULL DEFAULT 1,
    last_triggered_at INTEGER,
    created_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_webhooks_tenant ON webhooks(tenant_id, enabled);

  CREATE TABLE IF NOT EXISTS webhook_queue (
    id TEXT PRIMARY KEY,
    webhook_id TEXT NOT NULL,
    tenant_id TEXT NOT NULL,
    event_type TEXT NOT NULL,
    payload TEXT NOT NULL,
    attempts INTEGER NOT NULL DEFAULT 0,
    max_attempts INTEGER NOT NULL DEFAULT 5,
    next_retry_at INTEGER NOT NULL,
    status TEXT NOT NULL DEFAULT 'pending',
    last_error TEXT,
    created_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_webhook_queue_due ON webhook_queue(status, next_retry_at);
  CREATE INDEX IF NOT EXISTS idx_webhook_queue_webhook ON webhook_queue(webhook_id);
  CREATE INDEX IF NOT EXISTS idx_webhook_queue_tenant ON webhook_queue(tenant_id, status);
`;

export const MIGRATION_003_DOWN = `
  DROP TABLE IF EXISTS webhook_queue;
  DROP TABLE IF EXISTS webhooks;
`;
