/**
 * Migration 002 - Alerts
 *
 * Alert definitions (conditions and channels as JSON text) and the
 * append-only trigger history.
 */

export const MIGRATION_002_UP = `
  CREATE TABLE IF NOT EXISTS alerts (
    id TEXT PRIMARY KEY,
    tenant_id TEXT NOT NULL,
    name TEXT NOT NULL,
    conditions TEXT NOT NULL,
    condition_logic TEXT NOT NULL DEFAULT 'AND',
    window_seconds INTEGER NOT NULL,
    cooldown_seconds INTEGER NOT NULL,
    severity TEXT NOT NULL,
    channels TEXT NOT NULL DEFAULT '[]',
    enabled INTEGER NOT NULL DEFAULT 1,
    last_triggered_at INTEGER,
    created_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_alerts_tenant ON alerts(tenant_id);
  CREATE INDEX IF NOT EXISTS idx_alerts_enabled ON alerts(enabled);

  CREATE TABLE IF NOT EXISTS alert_history (
    id TEXT PRIMARY KEY,
    alert_id TEXT NOT NULL,
    tenant_id TEXT NOT NULL,
    triggered_at INTEGER NOT NULL,
    resolved_at INTEGER,
    status TEXT NOT NULL DEFAULT 'triggered',
    metadata TEXT NOT NULL DEFAULT '{}',
    created_at INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_alert_history_alert ON alert_history(tenant_id, alert_id, triggered_at);
`;

export const MIGRATION_002_DOWN = `
  DROP TABLE IF EXISTS alert_history;
  DROP TABLE IF EXISTS alerts;
`;
