/**
 * SQL Metrics Source - aggregates raw samples stored in metric_samples
 *
 * Samples are recorded by producers through `record()`. An empty window
 * produces 0 for sum/count; avg, min, max and p99 have no value without data
 * and reject instead.
 */

import type { Database } from '../db/index';
import { readNumber, readOptionalNumber } from '../db/rows';
import { MetricLookupError, ValidationError, errorMessage } from '../infra/errors';
import { systemClock, type Clock } from '../utils/clock';
import { createLogger } from '../utils/logger';
import type { Aggregation, MetricsSource } from './types';

const logger = createLogger('metrics');

export interface SqlMetricsSource extends MetricsSource {
  /** Store one observation. */
  record(tenantId: string, metricName: string, value: number, recordedAt?: number): void;
  /** Delete samples older than `before`. Returns how many were removed. */
  prune(before: number): number;
}

/** Nearest-rank percentile over ascending values. */
export function percentile(sorted: number[], pct: number): number {
  if (sorted.length === 0) {
    throw new Error('percentile of empty set');
  }
  const rank = Math.ceil((pct / 100) * sorted.length);
  const index = Math.min(sorted.length - 1, Math.max(0, rank - 1));
  return sorted[index];
}

export function createSqlMetricsSource(db: Database, options: { now?: Clock } = {}): SqlMetricsSource {
  const now = options.now ?? systemClock;

  function aggregateSql(aggregation: Exclude<Aggregation, 'p99'>): string {
    switch (aggregation) {
      case 'sum':
        return 'COALESCE(SUM(value), 0)';
      case 'count':
        return 'COUNT(*)';
      case 'avg':
        return 'AVG(value)';
      case 'min':
        return 'MIN(value)';
      case 'max':
        return 'MAX(value)';
    }
  }

  return {
    record(tenantId, metricName, value, recordedAt) {
      if (!Number.isFinite(value)) {
        throw new ValidationError('Metric value must be a finite number', [`${metricName}: ${value}`]);
      }
      db.run(
        'INSERT INTO metric_samples (tenant_id, metric_name, value, recorded_at) VALUES (?, ?, ?, ?)',
        [tenantId, metricName, value, recordedAt ?? now()],
      );
    },

    prune(before) {
      const { changes } = db.run('DELETE FROM metric_samples WHERE recorded_at < ?', [before]);
      if (changes > 0) logger.debug({ removed: changes, before }, 'Pruned metric samples');
      return changes;
    },

    async getMetricValue(tenantId, metricName, aggregation, windowStart, windowEnd) {
      const params = [tenantId, metricName, windowStart, windowEnd];
      const where = 'tenant_id = ? AND metric_name = ? AND recorded_at >= ? AND recorded_at <= ?';

      try {
        if (aggregation === 'p99') {
          const values = db
            .query(`SELECT value FROM metric_samples WHERE ${where} ORDER BY value ASC`, params)
            .map((row) => readNumber(row, 'value'));
          if (values.length === 0) {
            throw new MetricLookupError(metricName, 'no samples in window');
          }
          return percentile(values, 99);
        }

        const rows = db.query(`SELECT ${aggregateSql(aggregation)} AS result FROM metric_samples WHERE ${where}`, params);
        const result = rows.length > 0 ? readOptionalNumber(rows[0], 'result') : null;
        if (result === null) {
          throw new MetricLookupError(metricName, 'no samples in window');
        }
        return result;
      } catch (err) {
        if (err instanceof MetricLookupError) throw err;
        throw new MetricLookupError(metricName, errorMessage(err));
      }
    },
  };
}
