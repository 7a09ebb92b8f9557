/**
 * Alert Engine - Evaluates threshold conditions against aggregated metrics
 *
 * Pure over its inputs: the only collaborator is the injected MetricsSource
 * and the clock. A failed metric lookup rejects the whole evaluation.
 */

import type { MetricsSource } from '../metrics/types';
import { MetricLookupError, errorMessage } from '../infra/errors';
import { systemClock, type Clock } from '../utils/clock';
import {
  isComparisonOperator,
  type Alert,
  type ConditionLogic,
  type ConditionOutcome,
  type EvaluationResult,
} from './types';

// =============================================================================
// CONDITION LOGIC
// =============================================================================

/**
 * Compare a metric value to a threshold. Exact float comparison, no epsilon.
 * Unknown operators are never met.
 */
export function evaluateCondition(operator: string, value: number, threshold: number): boolean {
  switch (operator) {
    case 'gt':
      return value > threshold;
    case 'gte':
      return value >= threshold;
    case 'lt':
      return value < threshold;
    case 'lte':
      return value <= threshold;
    case 'eq':
      return value === threshold;
    case 'ne':
      return value !== threshold;
    default:
      return false;
  }
}

/** AND: every condition met. OR: at least one. */
export function combineConditions(logic: ConditionLogic, results: boolean[]): boolean {
  if (logic === 'OR') {
    return results.some(Boolean);
  }
  return results.every(Boolean);
}

/**
 * Cooldown gate: eligible when the alert never fired, or strictly after
 * `lastTriggeredAt + cooldownSeconds`.
 */
export function shouldTrigger(alert: Pick<Alert, 'lastTriggeredAt' | 'cooldownSeconds'>, now: number): boolean {
  if (alert.lastTriggeredAt === null) return true;
  return now > alert.lastTriggeredAt + alert.cooldownSeconds * 1000;
}

// =============================================================================
// ENGINE
// =============================================================================

export type EvaluableAlert = Pick<Alert, 'tenantId' | 'conditions' | 'conditionLogic' | 'windowSeconds'>;

export interface AlertEngine {
  evaluate(alert: EvaluableAlert): Promise<EvaluationResult>;
  shouldTrigger(alert: Pick<Alert, 'lastTriggeredAt' | 'cooldownSeconds'>, now: number): boolean;
}

export function createAlertEngine(metrics: MetricsSource, options: { now?: Clock } = {}): AlertEngine {
  const clock = options.now ?? systemClock;

  return {
    shouldTrigger,

    async evaluate(alert) {
      const windowEnd = clock();
      const windowStart = windowEnd - alert.windowSeconds * 1000;

      const outcomes: Record<string, ConditionOutcome> = {};
      const met: boolean[] = [];

      for (const condition of alert.conditions) {
        let value: number;
        try {
          value = await metrics.getMetricValue(
            alert.tenantId,
            condition.metricName,
            condition.aggregation,
            windowStart,
            windowEnd,
          );
        } catch (err) {
          if (err instanceof MetricLookupError) throw err;
          throw new MetricLookupError(condition.metricName, errorMessage(err));
        }

        const conditionMet = evaluateCondition(condition.operator, value, condition.threshold);
        met.push(conditionMet);

        const outcome: ConditionOutcome = {
          value,
          threshold: condition.threshold,
          operator: condition.operator,
          aggregation: condition.aggregation,
          met: conditionMet,
        };
        if (!isComparisonOperator(condition.operator)) {
          outcome.unsupportedOperator = true;
        }
        outcomes[condition.metricName] = outcome;
      }

      const triggered = met.length > 0 && combineConditions(alert.conditionLogic, met);

      return {
        triggered,
        metadata: {
          triggered,
          conditionLogic: alert.conditionLogic,
          windowStart: new Date(windowStart).toISOString(),
          windowEnd: new Date(windowEnd).toISOString(),
          metrics: outcomes,
        },
      };
    },
  };
}
