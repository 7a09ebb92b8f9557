/**
 * Webhook & Delivery Queue Types
 */

export interface Webhook {
  id: string;
  tenantId: string;
  name: string;
  url: string;
  /** HMAC-SHA256 key for outbound signatures. Never echoed in listings. */
  secret: string;
  /** Subscribed event types; '*' subscribes to every event */
  events: string[];
  enabled: boolean;
  lastTriggeredAt: number | null;
  createdAt: number;
  updatedAt: number;
}

export type DeliveryStatus = 'pending' | 'processing' | 'delivered' | 'failed';

export const DELIVERY_STATUSES: readonly DeliveryStatus[] = ['pending', 'processing', 'delivered', 'failed'];

export interface DeliveryQueueEntry {
  id: string;
  webhookId: string;
  tenantId: string;
  eventType: string;
  /** Raw JSON body, exactly as signed and sent */
  payload: string;
  attempts: number;
  maxAttempts: number;
  nextRetryAt: number;
  status: DeliveryStatus;
  lastError: string | null;
  createdAt: number;
  updatedAt: number;
}

/** Body of every outbound webhook call. */
export interface EventEnvelope<TData = unknown> {
  type: string;
  tenant_id: string;
  /** ISO-8601 */
  timestamp: string;
  data: TData;
}

export const DEFAULT_MAX_ATTEMPTS = 5;
