import { describe, it, expect, vi } from 'vitest';
import {
  combineConditions,
  createAlertEngine,
  evaluateCondition,
  shouldTrigger,
  type EvaluableAlert,
} from './engine';
import { MetricLookupError } from '../infra/errors';
import type { MetricsSource } from '../metrics/types';

const NOW = 1_700_000_000_000;

function fixedMetrics(values: Record<string, number>): MetricsSource {
  return {
    getMetricValue: vi.fn(async (_tenantId: string, metricName: string) => {
      const value = values[metricName];
      if (value === undefined) throw new MetricLookupError(metricName, 'no samples in window');
      return value;
    }),
  };
}

function alertWith(overrides: Partial<EvaluableAlert> = {}): EvaluableAlert {
  return {
    tenantId: 'tenant-1',
    conditionLogic: 'AND',
    windowSeconds: 300,
    conditions: [
      { metricName: 'cpu_usage', aggregation: 'avg', operator: 'gt', threshold: 80 },
      { metricName: 'memory_usage', aggregation: 'avg', operator: 'gt', threshold: 70 },
    ],
    ...overrides,
  };
}

describe('evaluateCondition', () => {
  it('applies each comparison operator', () => {
    expect(evaluateCondition('gt', 85, 80)).toBe(true);
    expect(evaluateCondition('gt', 80, 80)).toBe(false);
    expect(evaluateCondition('gte', 80, 80)).toBe(true);
    expect(evaluateCondition('lt', 79.5, 80)).toBe(true);
    expect(evaluateCondition('lt', 80, 80)).toBe(false);
    expect(evaluateCondition('lte', 80, 80)).toBe(true);
    expect(evaluateCondition('eq', 80, 80)).toBe(true);
    expect(evaluateCondition('ne', 80, 80)).toBe(false);
    expect(evaluateCondition('ne', 81, 80)).toBe(true);
  });

  it('compares floats exactly', () => {
    expect(evaluateCondition('eq', 0.1 + 0.2, 0.3)).toBe(false);
  });

  it('treats unknown operators as not met', () => {
    expect(evaluateCondition('between', 85, 80)).toBe(false);
    expect(evaluateCondition('', 85, 80)).toBe(false);
  });
});

describe('combineConditions', () => {
  it('AND requires every result', () => {
    expect(combineConditions('AND', [true, true])).toBe(true);
    expect(combineConditions('AND', [true, false])).toBe(false);
  });

  it('OR requires at least one result', () => {
    expect(combineConditions('OR', [false, true])).toBe(true);
    expect(combineConditions('OR', [false, false])).toBe(false);
  });
});

describe('shouldTrigger', () => {
  it('allows an alert that never fired', () => {
    expect(shouldTrigger({ lastTriggeredAt: null, cooldownSeconds: 300 }, NOW)).toBe(true);
  });

  it('blocks until strictly after the cooldown ends', () => {
    const last = NOW - 300_000;
    expect(shouldTrigger({ lastTriggeredAt: last, cooldownSeconds: 300 }, NOW)).toBe(false);
    expect(shouldTrigger({ lastTriggeredAt: last, cooldownSeconds: 300 }, NOW + 1)).toBe(true);
    expect(shouldTrigger({ lastTriggeredAt: NOW - 1000, cooldownSeconds: 300 }, NOW)).toBe(false);
  });
});

describe('AlertEngine.evaluate', () => {
  it('OR triggers when one of two conditions holds', async () => {
    const engine = createAlertEngine(fixedMetrics({ cpu_usage: 85, memory_usage: 65 }), { now: () => NOW });
    const result = await engine.evaluate(alertWith({ conditionLogic: 'OR' }));

    expect(result.triggered).toBe(true);
    expect(result.metadata.triggered).toBe(true);
    expect(result.metadata.metrics.cpu_usage.met).toBe(true);
    expect(result.metadata.metrics.memory_usage.met).toBe(false);
  });

  it('AND does not trigger when one of two conditions fails', async () => {
    const engine = createAlertEngine(fixedMetrics({ cpu_usage: 85, memory_usage: 65 }), { now: () => NOW });
    const result = await engine.evaluate(alertWith({ conditionLogic: 'AND' }));

    expect(result.triggered).toBe(false);
    expect(result.metadata.triggered).toBe(false);
  });

  it('records the window and every condition outcome', async () => {
    const engine = createAlertEngine(fixedMetrics({ cpu_usage: 85, memory_usage: 65 }), { now: () => NOW });
    const result = await engine.evaluate(alertWith());

    expect(result.metadata.conditionLogic).toBe('AND');
    expect(result.metadata.windowEnd).toBe(new Date(NOW).toISOString());
    expect(result.metadata.windowStart).toBe(new Date(NOW - 300_000).toISOString());
    expect(result.metadata.metrics.cpu_usage).toEqual({
      value: 85,
      threshold: 80,
      operator: 'gt',
      aggregation: 'avg',
      met: true,
    });
  });

  it('queries the metrics source over the alert window', async () => {
    const metrics = fixedMetrics({ cpu_usage: 85, memory_usage: 75 });
    const engine = createAlertEngine(metrics, { now: () => NOW });
    await engine.evaluate(alertWith({ windowSeconds: 60 }));

    expect(metrics.getMetricValue).toHaveBeenCalledWith('tenant-1', 'cpu_usage', 'avg', NOW - 60_000, NOW);
    expect(metrics.getMetricValue).toHaveBeenCalledWith('tenant-1', 'memory_usage', 'avg', NOW - 60_000, NOW);
  });

  it('flags an unknown operator and never counts it as met', async () => {
    const engine = createAlertEngine(fixedMetrics({ cpu_usage: 85 }), { now: () => NOW });
    const result = await engine.evaluate(
      alertWith({
        conditionLogic: 'OR',
        conditions: [{ metricName: 'cpu_usage', aggregation: 'avg', operator: 'above', threshold: 80 }],
      }),
    );

    expect(result.triggered).toBe(false);
    expect(result.metadata.metrics.cpu_usage.met).toBe(false);
    expect(result.metadata.metrics.cpu_usage.unsupportedOperator).toBe(true);
  });

  it('does not trigger with zero conditions', async () => {
    const engine = createAlertEngine(fixedMetrics({}), { now: () => NOW });
    const result = await engine.evaluate(alertWith({ conditions: [] }));

    expect(result.triggered).toBe(false);
    expect(result.metadata.metrics).toEqual({});
  });

  it('rejects on the first failed lookup without querying further', async () => {
    const metrics = fixedMetrics({ memory_usage: 75 });
    const engine = createAlertEngine(metrics, { now: () => NOW });

    await expect(engine.evaluate(alertWith())).rejects.toThrow('get metric cpu_usage: no samples in window');
    expect(metrics.getMetricValue).toHaveBeenCalledTimes(1);
  });

  it('wraps unexpected source errors in MetricLookupError', async () => {
    const metrics: MetricsSource = {
      getMetricValue: vi.fn(async () => {
        throw new Error('connection reset');
      }),
    };
    const engine = createAlertEngine(metrics, { now: () => NOW });

    const error = await engine.evaluate(alertWith()).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(MetricLookupError);
    expect(error).toHaveProperty('message', 'get metric cpu_usage: connection reset');
  });
});
