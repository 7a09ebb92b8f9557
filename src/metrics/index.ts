export { AGGREGATIONS, isAggregation } from './types';
export type { Aggregation, MetricsSource, MetricSample } from './types';
export { createSqlMetricsSource, percentile } from './sql-source';
export type { SqlMetricsSource } from './sql-source';
