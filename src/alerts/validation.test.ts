import { describe, it, expect } from 'vitest';
import {
  alertInputSchema,
  decodeChannels,
  decodeConditions,
  encodeChannels,
  encodeConditions,
  validateAlertInput,
} from './validation';

const base = {
  tenantId: 'tenant-1',
  name: 'Error spike',
  conditions: [{ metricName: 'errors', aggregation: 'count', operator: 'gte', threshold: 10 }],
  windowSeconds: 60,
  cooldownSeconds: 86_400,
  severity: 'warning',
  channels: [{ type: 'webhook', webhookId: 'wh_1' }],
};

describe('alertInputSchema', () => {
  it('accepts the window and cooldown bounds', () => {
    expect(alertInputSchema.safeParse(base).success).toBe(true);
  });

  it('rejects an unknown operator', () => {
    const result = alertInputSchema.safeParse({
      ...base,
      conditions: [{ metricName: 'errors', aggregation: 'count', operator: 'above', threshold: 10 }],
    });
    expect(result.success).toBe(false);
  });

  it('rejects an unknown aggregation', () => {
    const result = alertInputSchema.safeParse({
      ...base,
      conditions: [{ metricName: 'errors', aggregation: 'median', operator: 'gte', threshold: 10 }],
    });
    expect(result.success).toBe(false);
  });

  it('rejects an unknown severity', () => {
    expect(alertInputSchema.safeParse({ ...base, severity: 'fatal' }).success).toBe(false);
  });

  it('rejects names shorter than three characters', () => {
    expect(alertInputSchema.safeParse({ ...base, name: 'ab' }).success).toBe(false);
  });
});

describe('validateAlertInput', () => {
  it('lists every issue in the error', () => {
    expect(() =>
      validateAlertInput({
        tenantId: 'tenant-1',
        name: 'Error spike',
        conditions: [],
        windowSeconds: 30,
        cooldownSeconds: 60,
        severity: 'info',
        channels: [{ type: 'webhook', webhookId: 'wh_1' }],
      }),
    ).toThrow(
      'Invalid alert: conditions: at least one condition is required; windowSeconds: Number must be greater than or equal to 60',
    );
  });
});

describe('condition codec', () => {
  it('round-trips conditions through snake_case JSON', () => {
    const conditions = [{ metricName: 'latency_ms', aggregation: 'p99' as const, operator: 'lt', threshold: 250.5 }];
    const encoded = encodeConditions(conditions);

    expect(encoded).toBe('[{"metric_name":"latency_ms","aggregation":"p99","operator":"lt","threshold":250.5}]');
    expect(decodeConditions(JSON.parse(encoded))).toEqual(conditions);
  });

  it('keeps an unknown stored operator so evaluation can flag it', () => {
    const decoded = decodeConditions([{ metric_name: 'cpu', aggregation: 'avg', operator: 'between', threshold: 1 }]);
    expect(decoded[0].operator).toBe('between');
  });

  it('rejects a stored value that is not a condition list', () => {
    expect(() => decodeConditions({ metric_name: 'cpu' })).toThrow('Malformed stored conditions');
  });
});

describe('channel codec', () => {
  it('encodes webhook channels with webhook_id', () => {
    expect(encodeChannels([{ type: 'webhook', webhookId: 'wh_9' }])).toBe('[{"type":"webhook","webhook_id":"wh_9"}]');
  });

  it('decodes unknown types as unsupported', () => {
    expect(decodeChannels([{ type: 'webhook', webhook_id: 'wh_9' }, { type: 'sms' }])).toEqual([
      { type: 'webhook', webhookId: 'wh_9' },
      { type: 'unsupported', declaredType: 'sms' },
    ]);
  });

  it('treats a webhook channel without an id as unsupported', () => {
    expect(decodeChannels([{ type: 'webhook' }])).toEqual([{ type: 'unsupported', declaredType: 'webhook' }]);
  });
});
