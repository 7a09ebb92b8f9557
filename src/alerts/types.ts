/**
 * Alert Types
 */

import type { Aggregation } from '../metrics/types';

// =============================================================================
// CONDITIONS
// =============================================================================

export const COMPARISON_OPERATORS = ['gt', 'gte', 'lt', 'lte', 'eq', 'ne'] as const;

export type ComparisonOperator = (typeof COMPARISON_OPERATORS)[number];

export function isComparisonOperator(value: string): value is ComparisonOperator {
  return (COMPARISON_OPERATORS as readonly string[]).includes(value);
}

export interface Condition {
  metricName: string;
  aggregation: Aggregation;
  /**
   * Normally a ComparisonOperator. Rows written before validation existed may
   * carry anything else; such a condition is never met.
   */
  operator: string;
  threshold: number;
}

export const CONDITION_LOGICS = ['AND', 'OR'] as const;

export type ConditionLogic = (typeof CONDITION_LOGICS)[number];

// =============================================================================
// CHANNELS
// =============================================================================

export interface WebhookChannel {
  type: 'webhook';
  webhookId: string;
}

/** A stored channel whose type this build cannot deliver to. */
export interface UnsupportedChannel {
  type: 'unsupported';
  declaredType: string;
}

export type Channel = WebhookChannel | UnsupportedChannel;

// =============================================================================
// ALERTS
// =============================================================================

export const SEVERITIES = ['info', 'warning', 'critical'] as const;

export type Severity = (typeof SEVERITIES)[number];

export interface Alert {
  id: string;
  tenantId: string;
  name: string;
  conditions: Condition[];
  conditionLogic: ConditionLogic;
  windowSeconds: number;
  cooldownSeconds: number;
  severity: Severity;
  channels: Channel[];
  enabled: boolean;
  lastTriggeredAt: number | null;
  createdAt: number;
  updatedAt: number;
}

// =============================================================================
// EVALUATION
// =============================================================================

export interface ConditionOutcome {
  value: number;
  threshold: number;
  operator: string;
  aggregation: Aggregation;
  met: boolean;
  /** Set when the operator is not one of COMPARISON_OPERATORS */
  unsupportedOperator?: true;
}

/** Audit record of one evaluation, persisted with the history row. */
export interface EvaluationMetadata {
  triggered: boolean;
  conditionLogic: ConditionLogic;
  /** ISO-8601 */
  windowStart: string;
  /** ISO-8601 */
  windowEnd: string;
  /** Keyed by metric name */
  metrics: Record<string, ConditionOutcome>;
}

export interface EvaluationResult {
  triggered: boolean;
  metadata: EvaluationMetadata;
}

// =============================================================================
// HISTORY
// =============================================================================

export type AlertHistoryStatus = 'triggered' | 'acknowledged' | 'resolved';

export interface AlertHistory {
  id: string;
  alertId: string;
  tenantId: string;
  triggeredAt: number;
  resolvedAt: number | null;
  status: AlertHistoryStatus;
  metadata: EvaluationMetadata;
  createdAt: number;
}

// =============================================================================
// NOTIFICATION
// =============================================================================

export type ChannelResult =
  | { channel: Channel; ok: true; entryId: string }
  | { channel: Channel; ok: false; error: string };

export interface NotificationReport {
  total: number;
  failed: number;
  results: ChannelResult[];
}
