/**
 * Metrics Types
 */

export const AGGREGATIONS = ['sum', 'avg', 'count', 'min', 'max', 'p99'] as const;

export type Aggregation = (typeof AGGREGATIONS)[number];

export function isAggregation(value: string): value is Aggregation {
  return (AGGREGATIONS as readonly string[]).includes(value);
}

/**
 * Capability the alert engine depends on: one aggregated value for a tenant's
 * metric over a time window. Rejects when no value can be produced.
 */
export interface MetricsSource {
  getMetricValue(
    tenantId: string,
    metricName: string,
    aggregation: Aggregation,
    windowStart: number,
    windowEnd: number,
  ): Promise<number>;
}

export interface MetricSample {
  tenantId: string;
  metricName: string;
  value: number;
  recordedAt: number;
}
