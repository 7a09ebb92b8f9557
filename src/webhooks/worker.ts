/**
 * Delivery Worker - drains the webhook queue on a fixed tick
 *
 * Each tick first returns stale processing entries to pending, then claims
 * a batch of due entries and delivers them one at a time. A failure on one
 * entry is recorded on that entry and never stops the batch. Once the signal
 * aborts, entries of the batch not yet sent go back to pending untouched.
 */

import { computeBackoff, isRetryable, type BackoffOptions } from '../infra/retry';
import { errorMessage } from '../infra/errors';
import { createTickLoop, type TickLoop } from '../cron/index';
import { systemClock, type Clock } from '../utils/clock';
import { createLogger } from '../utils/logger';
import type { Dispatcher } from './dispatcher';
import type { DeliveryQueueStore } from './queue';
import type { WebhookStore } from './store';
import type { DeliveryQueueEntry } from './types';

const logger = createLogger('delivery-worker');

// =============================================================================
// TYPES
// =============================================================================

export interface DeliveryWorkerConfig extends BackoffOptions {
  /** Tick interval in ms. Default: 5000 */
  intervalMs: number;
  /** Entries claimed per tick. Default: 10 */
  batchSize: number;
  /** Processing entries older than this are returned to pending; must exceed a full batch of request timeouts */
  staleAfterMs: number;
}

export const DEFAULT_WORKER_CONFIG: DeliveryWorkerConfig = {
  intervalMs: 5_000,
  batchSize: 10,
  baseDelayMs: 1_000,
  maxDelayMs: 15 * 60 * 1000,
  staleAfterMs: 5 * 60 * 1000,
};

export interface DeliveryWorkerDeps {
  queue: DeliveryQueueStore;
  webhooks: WebhookStore;
  dispatcher: Dispatcher;
  now?: Clock;
}

export type DeliveryOutcome = 'delivered' | 'retry' | 'failed' | 'error';

export interface DeliveryTickSummary {
  claimed: number;
  delivered: number;
  retried: number;
  failed: number;
  /** Claimed but returned to pending unsent because the tick was cancelled */
  released: number;
  /** Entries whose state could not be recorded (store errors) */
  errors: number;
}

export interface DeliveryWorker {
  start(): void;
  stop(): Promise<void>;
  isRunning(): boolean;
  /** Run one claim-and-deliver pass now. */
  tick(signal?: AbortSignal): Promise<DeliveryTickSummary>;
}

// =============================================================================
// IMPLEMENTATION
// =============================================================================

export function createDeliveryWorker(
  deps: DeliveryWorkerDeps,
  config: Partial<DeliveryWorkerConfig> = {},
  options: { signal?: AbortSignal } = {},
): DeliveryWorker {
  const cfg: DeliveryWorkerConfig = { ...DEFAULT_WORKER_CONFIG, ...config };
  const now = deps.now ?? systemClock;
  const { queue, webhooks, dispatcher } = deps;

  function fail(entry: DeliveryQueueEntry, reason: string): DeliveryOutcome {
    queue.markFailed(entry.id, reason);
    logger.warn({ entryId: entry.id, webhookId: entry.webhookId, reason }, 'Delivery failed permanently');
    return 'failed';
  }

  async function deliver(entry: DeliveryQueueEntry, signal?: AbortSignal): Promise<DeliveryOutcome> {
    const webhook = webhooks.getById(entry.webhookId);
    if (!webhook || webhook.tenantId !== entry.tenantId) {
      return fail(entry, 'webhook not found');
    }
    if (!webhook.enabled) {
      return fail(entry, 'webhook disabled');
    }

    try {
      const result = await dispatcher.dispatch(
        {
          url: webhook.url,
          secret: webhook.secret,
          eventType: entry.eventType,
          deliveryId: entry.id,
          body: entry.payload,
        },
        signal,
      );

      queue.markDelivered(entry.id);
      webhooks.updateLastTriggered(webhook.id, now());
      logger.info(
        { entryId: entry.id, webhookId: webhook.id, status: result.status, durationMs: result.durationMs },
        'Webhook delivered',
      );
      return 'delivered';
    } catch (err) {
      const message = errorMessage(err);
      if (!isRetryable(err)) {
        return fail(entry, message);
      }

      const outcome = queue.recordFailure(entry.id, message, (attemptsBefore) =>
        computeBackoff(attemptsBefore, cfg),
      );
      if (outcome.status === 'failed') {
        logger.warn(
          { entryId: entry.id, webhookId: webhook.id, attempts: outcome.attempts, error: message },
          'Delivery failed permanently',
        );
        return 'failed';
      }

      logger.info(
        {
          entryId: entry.id,
          webhookId: webhook.id,
          attempts: outcome.attempts,
          nextRetryAt: outcome.nextRetryAt,
          error: message,
        },
        'Delivery scheduled for retry',
      );
      return 'retry';
    }
  }

  function releaseUnsent(entries: DeliveryQueueEntry[], summary: DeliveryTickSummary): void {
    for (const entry of entries) {
      try {
        queue.release(entry.id);
        summary.released++;
      } catch (err) {
        logger.error({ err, entryId: entry.id }, 'Failed to release delivery');
        summary.errors++;
      }
    }
    logger.info({ released: summary.released }, 'Delivery tick cancelled');
  }

  async function tick(signal?: AbortSignal): Promise<DeliveryTickSummary> {
    const summary: DeliveryTickSummary = { claimed: 0, delivered: 0, retried: 0, failed: 0, released: 0, errors: 0 };
    if (signal?.aborted) return summary;

    try {
      queue.releaseStale(cfg.staleAfterMs);
    } catch (err) {
      logger.error({ err }, 'Failed to release stale deliveries');
    }

    const entries = queue.claimBatch(cfg.batchSize);
    summary.claimed = entries.length;

    for (const [index, entry] of entries.entries()) {
      if (signal?.aborted) {
        releaseUnsent(entries.slice(index), summary);
        break;
      }

      let outcome: DeliveryOutcome;
      try {
        outcome = await deliver(entry, signal);
      } catch (err) {
        logger.error({ err, entryId: entry.id, webhookId: entry.webhookId }, 'Failed to process delivery');
        outcome = 'error';
      }

      switch (outcome) {
        case 'delivered':
          summary.delivered++;
          break;
        case 'retry':
          summary.retried++;
          break;
        case 'failed':
          summary.failed++;
          break;
        case 'error':
          summary.errors++;
          break;
      }
    }

    return summary;
  }

  const loop: TickLoop = createTickLoop({
    name: 'delivery-worker',
    intervalMs: cfg.intervalMs,
    signal: options.signal,
    tick,
  });

  return {
    start: () => loop.start(),
    stop: () => loop.stop(),
    isRunning: () => loop.isRunning(),
    tick,
  };
}
