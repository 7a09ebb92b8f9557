/**
 * Alert Store - persistence for alert definitions and trigger history
 *
 * Conditions, channels and history metadata are JSON text columns; they are
 * decoded into typed values here and nowhere else.
 */

import { z } from 'zod';
import type { Database, Row, SqlBindValue } from '../db/index';
import { readBoolean, readJson, readNumber, readOptionalNumber, readString } from '../db/rows';
import { AGGREGATIONS } from '../metrics/types';
import { HistoryTransitionError, NotFoundError, ValidationError } from '../infra/errors';
import { generateId } from '../utils/id';
import { systemClock, type Clock } from '../utils/clock';
import { createLogger } from '../utils/logger';
import {
  CONDITION_LOGICS,
  SEVERITIES,
  type Alert,
  type AlertHistory,
  type AlertHistoryStatus,
  type EvaluationMetadata,
} from './types';
import {
  alertInputSchema,
  decodeChannels,
  decodeConditions,
  encodeChannels,
  encodeConditions,
  validateAlertInput,
  type AlertPatch,
  type CreateAlertInput,
} from './validation';

const logger = createLogger('alert-store');

// =============================================================================
// INTERFACE
// =============================================================================

export interface AlertStore {
  /** Validate and persist a new alert. */
  create(input: CreateAlertInput): Alert;
  get(tenantId: string, alertId: string): Alert | undefined;
  listByTenant(tenantId: string): Alert[];
  /** Apply a partial update; the merged alert is validated as a whole. */
  update(tenantId: string, alertId: string, patch: AlertPatch): Alert;
  delete(tenantId: string, alertId: string): void;

  /** Every enabled alert across all tenants. Undecodable rows are skipped. */
  listEnabled(): Alert[];
  updateLastTriggered(alertId: string, at: number): void;

  saveHistory(history: AlertHistory): void;
  listHistory(tenantId: string, alertId: string, limit?: number): AlertHistory[];
  acknowledgeHistory(tenantId: string, historyId: string): AlertHistory;
  resolveHistory(tenantId: string, historyId: string): AlertHistory;
}

// =============================================================================
// ROW PARSERS
// =============================================================================

const conditionLogicSchema = z.enum(CONDITION_LOGICS).catch('AND');
const severitySchema = z.enum(SEVERITIES);
const historyStatusSchema = z.enum(['triggered', 'acknowledged', 'resolved']);

const metadataSchema = z.object({
  triggered: z.boolean(),
  conditionLogic: z.enum(CONDITION_LOGICS),
  windowStart: z.string(),
  windowEnd: z.string(),
  metrics: z.record(
    z.object({
      value: z.number(),
      threshold: z.number(),
      operator: z.string(),
      aggregation: z.enum(AGGREGATIONS),
      met: z.boolean(),
      unsupportedOperator: z.literal(true).optional(),
    }),
  ),
});

function parseMetadata(raw: unknown): EvaluationMetadata {
  const parsed = metadataSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError('Malformed history metadata', parsed.error.issues.map((i) => i.message));
  }
  return parsed.data;
}

function parseAlertRow(row: Row): Alert {
  const severity = severitySchema.safeParse(readString(row, 'severity'));
  if (!severity.success) {
    throw new ValidationError('Malformed stored severity', [readString(row, 'severity')]);
  }
  return {
    id: readString(row, 'id'),
    tenantId: readString(row, 'tenant_id'),
    name: readString(row, 'name'),
    conditions: decodeConditions(readJson(row, 'conditions')),
    // Anything other than OR evaluates as AND
    conditionLogic: conditionLogicSchema.parse(readString(row, 'condition_logic')),
    windowSeconds: readNumber(row, 'window_seconds'),
    cooldownSeconds: readNumber(row, 'cooldown_seconds'),
    severity: severity.data,
    channels: decodeChannels(readJson(row, 'channels')),
    enabled: readBoolean(row, 'enabled'),
    lastTriggeredAt: readOptionalNumber(row, 'last_triggered_at'),
    createdAt: readNumber(row, 'created_at'),
    updatedAt: readNumber(row, 'updated_at'),
  };
}

function parseHistoryRow(row: Row): AlertHistory {
  const status = historyStatusSchema.safeParse(readString(row, 'status'));
  if (!status.success) {
    throw new ValidationError('Malformed stored history status', [readString(row, 'status')]);
  }
  return {
    id: readString(row, 'id'),
    alertId: readString(row, 'alert_id'),
    tenantId: readString(row, 'tenant_id'),
    triggeredAt: readNumber(row, 'triggered_at'),
    resolvedAt: readOptionalNumber(row, 'resolved_at'),
    status: status.data,
    metadata: parseMetadata(readJson(row, 'metadata')),
    createdAt: readNumber(row, 'created_at'),
  };
}

const ALERT_COLUMNS = `id, tenant_id, name, conditions, condition_logic, window_seconds, cooldown_seconds,
  severity, channels, enabled, last_triggered_at, created_at, updated_at`;

const HISTORY_COLUMNS = 'id, alert_id, tenant_id, triggered_at, resolved_at, status, metadata, created_at';

// =============================================================================
// IMPLEMENTATION
// =============================================================================

export function createAlertStore(db: Database, options: { now?: Clock } = {}): AlertStore {
  const now = options.now ?? systemClock;

  function getHistory(tenantId: string, historyId: string): AlertHistory | undefined {
    const rows = db.query(`SELECT ${HISTORY_COLUMNS} FROM alert_history WHERE id = ? AND tenant_id = ?`, [
      historyId,
      tenantId,
    ]);
    return rows.length > 0 ? parseHistoryRow(rows[0]) : undefined;
  }

  /** Status changes are one-way: triggered -> acknowledged -> resolved. */
  function setHistoryStatus(
    tenantId: string,
    historyId: string,
    status: Exclude<AlertHistoryStatus, 'triggered'>,
    resolvedAt: number | null,
  ): AlertHistory {
    const from: AlertHistoryStatus[] = status === 'acknowledged' ? ['triggered'] : ['triggered', 'acknowledged'];
    const { changes } = db.run(
      `UPDATE alert_history SET status = ?, resolved_at = COALESCE(?, resolved_at)
       WHERE id = ? AND tenant_id = ? AND status IN (${from.map(() => '?').join(', ')})`,
      [status, resolvedAt, historyId, tenantId, ...from],
    );
    if (changes === 0) {
      const current = getHistory(tenantId, historyId);
      if (!current) throw new NotFoundError('alert history', historyId);
      throw new HistoryTransitionError(historyId, status, current.status);
    }

    const updated = getHistory(tenantId, historyId);
    if (!updated) throw new NotFoundError('alert history', historyId);
    logger.info({ historyId, tenantId, status }, 'Alert history status changed');
    return updated;
  }

  const store: AlertStore = {
    create(input) {
      const valid = validateAlertInput(input);
      const timestamp = now();
      const alert: Alert = {
        id: generateId('alert'),
        tenantId: valid.tenantId,
        name: valid.name,
        conditions: valid.conditions,
        conditionLogic: valid.conditionLogic,
        windowSeconds: valid.windowSeconds,
        cooldownSeconds: valid.cooldownSeconds,
        severity: valid.severity,
        channels: valid.channels,
        enabled: valid.enabled,
        lastTriggeredAt: null,
        createdAt: timestamp,
        updatedAt: timestamp,
      };

      db.run(
        `INSERT INTO alerts (${ALERT_COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        [
          alert.id,
          alert.tenantId,
          alert.name,
          encodeConditions(alert.conditions),
          alert.conditionLogic,
          alert.windowSeconds,
          alert.cooldownSeconds,
          alert.severity,
          encodeChannels(alert.channels),
          alert.enabled ? 1 : 0,
          null,
          alert.createdAt,
          alert.updatedAt,
        ],
      );

      logger.info({ alertId: alert.id, tenantId: alert.tenantId, name: alert.name }, 'Alert created');
      return alert;
    },

    get(tenantId, alertId) {
      const rows = db.query(`SELECT ${ALERT_COLUMNS} FROM alerts WHERE id = ? AND tenant_id = ?`, [
        alertId,
        tenantId,
      ]);
      return rows.length > 0 ? parseAlertRow(rows[0]) : undefined;
    },

    listByTenant(tenantId) {
      return db
        .query(`SELECT ${ALERT_COLUMNS} FROM alerts WHERE tenant_id = ? ORDER BY created_at DESC, id`, [tenantId])
        .map(parseAlertRow);
    },

    update(tenantId, alertId, patch) {
      const existing = store.get(tenantId, alertId);
      if (!existing) throw new NotFoundError('alert', alertId);

      // Stored channels the validator does not accept are dropped on update
      const webhookChannels = existing.channels.flatMap((c) =>
        c.type === 'webhook' ? [{ type: c.type, webhookId: c.webhookId }] : [],
      );
      const merged = alertInputSchema.safeParse({
        tenantId,
        name: patch.name ?? existing.name,
        conditions: patch.conditions ?? existing.conditions,
        conditionLogic: patch.conditionLogic ?? existing.conditionLogic,
        windowSeconds: patch.windowSeconds ?? existing.windowSeconds,
        cooldownSeconds: patch.cooldownSeconds ?? existing.cooldownSeconds,
        severity: patch.severity ?? existing.severity,
        channels: patch.channels ?? webhookChannels,
        enabled: patch.enabled ?? existing.enabled,
      });
      if (!merged.success) {
        throw new ValidationError(
          'Invalid alert',
          merged.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
        );
      }

      const valid = merged.data;
      const updated: Alert = { ...existing, ...valid, updatedAt: now() };
      db.run(
        `UPDATE alerts
         SET name = ?, conditions = ?, condition_logic = ?, window_seconds = ?, cooldown_seconds = ?,
             severity = ?, channels = ?, enabled = ?, updated_at = ?
         WHERE id = ? AND tenant_id = ?`,
        [
          updated.name,
          encodeConditions(updated.conditions),
          updated.conditionLogic,
          updated.windowSeconds,
          updated.cooldownSeconds,
          updated.severity,
          encodeChannels(updated.channels),
          updated.enabled ? 1 : 0,
          updated.updatedAt,
          alertId,
          tenantId,
        ],
      );

      logger.info({ alertId, tenantId }, 'Alert updated');
      return updated;
    },

    delete(tenantId, alertId) {
      const { changes } = db.run('DELETE FROM alerts WHERE id = ? AND tenant_id = ?', [alertId, tenantId]);
      if (changes === 0) throw new NotFoundError('alert', alertId);
      logger.info({ alertId, tenantId }, 'Alert deleted');
    },

    listEnabled() {
      const alerts: Alert[] = [];
      for (const row of db.query(`SELECT ${ALERT_COLUMNS} FROM alerts WHERE enabled = 1 ORDER BY tenant_id, name`)) {
        try {
          alerts.push(parseAlertRow(row));
        } catch (err) {
          logger.error({ err, alertId: row.id, tenantId: row.tenant_id }, 'Skipping undecodable alert');
        }
      }
      return alerts;
    },

    updateLastTriggered(alertId, at) {
      const { changes } = db.run('UPDATE alerts SET last_triggered_at = ? WHERE id = ?', [at, alertId]);
      if (changes === 0) throw new NotFoundError('alert', alertId);
    },

    saveHistory(history) {
      const params: SqlBindValue[] = [
        history.id,
        history.alertId,
        history.tenantId,
        history.triggeredAt,
        history.resolvedAt,
        history.status,
        JSON.stringify(history.metadata),
        history.createdAt,
      ];
      db.run(`INSERT INTO alert_history (${HISTORY_COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?, ?)`, params);
    },

    listHistory(tenantId, alertId, limit = 50) {
      const safeLimit = Math.max(1, Math.min(limit, 200));
      return db
        .query(
          `SELECT ${HISTORY_COLUMNS} FROM alert_history
           WHERE tenant_id = ? AND alert_id = ?
           ORDER BY triggered_at DESC
           LIMIT ?`,
          [tenantId, alertId, safeLimit],
        )
        .map(parseHistoryRow);
    },

    acknowledgeHistory(tenantId, historyId) {
      return setHistoryStatus(tenantId, historyId, 'acknowledged', null);
    },

    resolveHistory(tenantId, historyId) {
      return setHistoryStatus(tenantId, historyId, 'resolved', now());
    },
  };

  return store;
}
