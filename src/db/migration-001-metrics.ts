/**
 * Migration 001 - Metric samples
 *
 * Raw metric observations per tenant. Alert conditions aggregate over these.
 */

export const MIGRATION_001_UP = `
  CREATE TABLE IF NOT EXISTS metric_samples (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    tenant_id TEXT NOT NULL,
    metric_name TEXT NOT NULL,
    value REAL NOT NULL,
    recorded_at INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_metric_samples_lookup ON metric_samples(tenant_id, metric_name, recorded_at);
`;

export const MIGRATION_001_DOWN = `
  DROP TABLE IF EXISTS metric_samples;
`;
