/**
 * Signalpost - alert evaluation and webhook delivery pipeline
 *
 * createPipeline wires the stores, the alert scheduler and the delivery
 * worker over one database handle.
 */

import { createDatabase, type Database } from './db/index';
import { createAlertEngine, type AlertEngine } from './alerts/engine';
import { createNotifier, type Notifier } from './alerts/notifier';
import { createAlertScheduler, type AlertScheduler } from './alerts/scheduler';
import { createAlertStore, type AlertStore } from './alerts/store';
import { createSqlMetricsSource, type SqlMetricsSource } from './metrics/sql-source';
import type { MetricsSource } from './metrics/types';
import { createDispatcher, type FetchLike } from './webhooks/dispatcher';
import { createEventPublisher, type EventPublisher } from './webhooks/events';
import { createDeliveryQueueStore, type DeliveryQueueStore } from './webhooks/queue';
import { createWebhookStore, type WebhookStore } from './webhooks/store';
import { createDeliveryWorker, type DeliveryWorker } from './webhooks/worker';
import { systemClock, type Clock } from './utils/clock';
import type { SignalpostConfig } from './utils/config';
import { createLogger } from './utils/logger';

const logger = createLogger('pipeline');

export interface PipelineOptions {
  /** Use this handle instead of opening config.database.file */
  db?: Database;
  /** Replaces the SQL metrics source for alert evaluation */
  metrics?: MetricsSource;
  fetch?: FetchLike;
  now?: Clock;
  /** Aborting stops both loops and cancels in-flight deliveries */
  signal?: AbortSignal;
}

export interface Pipeline {
  db: Database;
  alerts: AlertStore;
  webhooks: WebhookStore;
  queue: DeliveryQueueStore;
  samples: SqlMetricsSource;
  engine: AlertEngine;
  notifier: Notifier;
  events: EventPublisher;
  scheduler: AlertScheduler;
  worker: DeliveryWorker;
  start(): void;
  /** Stop both loops, wait for in-flight ticks, then close the database. */
  stop(): Promise<void>;
}

export async function createPipeline(config: SignalpostConfig, options: PipelineOptions = {}): Promise<Pipeline> {
  const now = options.now ?? systemClock;
  const db = options.db ?? (await createDatabase({ file: config.database.file }));

  const alerts = createAlertStore(db, { now });
  const webhooks = createWebhookStore(db, { now });
  const queue = createDeliveryQueueStore(db, { now });
  const samples = createSqlMetricsSource(db, { now });
  const engine = createAlertEngine(options.metrics ?? samples, { now });
  const notifier = createNotifier({ webhooks, queue, now, maxAttempts: config.delivery.maxAttempts });
  const events = createEventPublisher({ webhooks, queue, now, maxAttempts: config.delivery.maxAttempts });

  const scheduler = createAlertScheduler(
    { store: alerts, engine, notifier, now },
    { intervalMs: config.alerts.intervalMs, signal: options.signal },
  );

  const dispatcher = createDispatcher({
    timeoutMs: config.delivery.requestTimeoutMs,
    userAgent: config.delivery.userAgent,
    fetch: options.fetch,
  });
  const worker = createDeliveryWorker({ queue, webhooks, dispatcher, now }, config.delivery, {
    signal: options.signal,
  });

  let stopped = false;

  return {
    db,
    alerts,
    webhooks,
    queue,
    samples,
    engine,
    notifier,
    events,
    scheduler,
    worker,

    start() {
      scheduler.start();
      worker.start();
      logger.info(
        { alertIntervalMs: config.alerts.intervalMs, deliveryIntervalMs: config.delivery.intervalMs },
        'Pipeline started',
      );
    },

    async stop() {
      if (stopped) return;
      stopped = true;
      await Promise.all([scheduler.stop(), worker.stop()]);
      db.close();
      logger.info('Pipeline stopped');
    },
  };
}

export { loadConfig, defaultConfig } from './utils/config';
export type { SignalpostConfig } from './utils/config';
export { createDatabase, createMemoryDatabase } from './db/index';
export type { Database } from './db/index';
export * from './alerts/index';
export * from './webhooks/index';
export * from './metrics/index';
export * from './infra/errors';
export { RetryableError, NonRetryableError, DeliveryError, computeBackoff, isRetryable } from './infra/retry';
