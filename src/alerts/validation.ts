/**
 * Alert input validation and the JSON column codecs for conditions/channels.
 */

import { z } from 'zod';
import { AGGREGATIONS } from '../metrics/types';
import { ValidationError } from '../infra/errors';
import { COMPARISON_OPERATORS, CONDITION_LOGICS, SEVERITIES, type Channel, type Condition } from './types';

// =============================================================================
// INPUT
// =============================================================================

const MIN_SECONDS = 60;
const MAX_SECONDS = 86_400;

const conditionInputSchema = z.object({
  metricName: z.string().trim().min(1).max(255),
  aggregation: z.enum(AGGREGATIONS),
  operator: z.enum(COMPARISON_OPERATORS),
  threshold: z.number().finite(),
});

const channelInputSchema = z.object({
  type: z.literal('webhook'),
  webhookId: z.string().min(1),
});

const alertFieldsSchema = z.object({
  name: z.string().trim().min(3).max(255),
  conditions: z.array(conditionInputSchema).min(1, 'at least one condition is required'),
  conditionLogic: z.enum(CONDITION_LOGICS).default('AND'),
  windowSeconds: z.number().int().min(MIN_SECONDS).max(MAX_SECONDS),
  cooldownSeconds: z.number().int().min(MIN_SECONDS).max(MAX_SECONDS),
  severity: z.enum(SEVERITIES),
  channels: z.array(channelInputSchema).default([]),
  enabled: z.boolean().default(true),
});

function requireChannelsWhenEnabled(
  value: { enabled: boolean; channels: unknown[] },
  ctx: z.RefinementCtx,
): void {
  if (value.enabled && value.channels.length === 0) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['channels'],
      message: 'an enabled alert needs at least one channel',
    });
  }
}

export const alertInputSchema = alertFieldsSchema
  .extend({ tenantId: z.string().min(1) })
  .superRefine(requireChannelsWhenEnabled);

export const alertPatchSchema = alertFieldsSchema.partial();

export type CreateAlertInput = z.input<typeof alertInputSchema>;
export type ValidAlertInput = z.output<typeof alertInputSchema>;
export type AlertPatch = z.input<typeof alertPatchSchema>;

function toValidationError(message: string, error: z.ZodError): ValidationError {
  return new ValidationError(
    message,
    error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message)),
  );
}

/** Validate a new alert definition. Throws ValidationError listing every issue. */
export function validateAlertInput(input: CreateAlertInput): ValidAlertInput {
  const parsed = alertInputSchema.safeParse(input);
  if (!parsed.success) {
    throw toValidationError('Invalid alert', parsed.error);
  }
  return parsed.data;
}

// =============================================================================
// STORAGE CODECS
// =============================================================================

const storedConditionsSchema = z.array(
  z.object({
    metric_name: z.string(),
    aggregation: z.enum(AGGREGATIONS),
    operator: z.string(),
    threshold: z.number(),
  }),
);

const storedChannelsSchema = z.array(
  z.object({
    type: z.string(),
    webhook_id: z.string().optional(),
  }),
);

export function encodeConditions(conditions: Condition[]): string {
  return JSON.stringify(
    conditions.map((c) => ({
      metric_name: c.metricName,
      aggregation: c.aggregation,
      operator: c.operator,
      threshold: c.threshold,
    })),
  );
}

export function decodeConditions(raw: unknown): Condition[] {
  const parsed = storedConditionsSchema.safeParse(raw);
  if (!parsed.success) {
    throw toValidationError('Malformed stored conditions', parsed.error);
  }
  return parsed.data.map((c) => ({
    metricName: c.metric_name,
    aggregation: c.aggregation,
    operator: c.operator,
    threshold: c.threshold,
  }));
}

export function encodeChannels(channels: Channel[]): string {
  return JSON.stringify(
    channels.map((c) => (c.type === 'webhook' ? { type: 'webhook', webhook_id: c.webhookId } : { type: c.declaredType })),
  );
}

export function decodeChannels(raw: unknown): Channel[] {
  const parsed = storedChannelsSchema.safeParse(raw);
  if (!parsed.success) {
    throw toValidationError('Malformed stored channels', parsed.error);
  }
  return parsed.data.map((c): Channel => {
    if (c.type === 'webhook' && c.webhook_id) {
      return { type: 'webhook', webhookId: c.webhook_id };
    }
    return { type: 'unsupported', declaredType: c.type };
  });
}
